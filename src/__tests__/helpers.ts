import { createLogger, LogLevel } from '../utils/logger';
import type { Logger } from '../utils/logger';

export interface DocumentParts {
  worldbody: string;
  defaults?: string;
  options?: string;
  model?: string;
}

/**
 * Wraps body markup in a complete document.
 */
export function xmlDocument({ worldbody, defaults, options, model }: DocumentParts): string {
  const modelAttr = model === undefined ? '' : ` model="${model}"`;
  return [
    `<x_xy${modelAttr}>`,
    options ?? '<options gravity="0 0 9.81" dt="0.01"/>',
    defaults ?? '',
    `<worldbody>${worldbody}</worldbody>`,
    '</x_xy>',
  ].join('\n');
}

export interface CapturingLogger {
  logger: Logger;
  messages: string[];
}

/**
 * Logger that records its messages without colour codes or timestamps.
 */
export function capturingLogger(level: LogLevel = LogLevel.DEBUG): CapturingLogger {
  const messages: string[] = [];
  const logger = createLogger({
    level,
    timestamp: false,
    prefix: 'T',
    sink: message => {
      messages.push(message.replace(/\x1b\[\d+m/g, ''));
    },
  });
  return { logger, messages };
}
