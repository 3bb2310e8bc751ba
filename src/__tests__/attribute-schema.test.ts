import { describe, it, expect } from 'vitest';
import { parseXmlDocument } from '../parsers/xml-document';
import { validateDocumentSchema } from '../parsers/helpers/attribute-schema';
import { SchemaViolationError } from '../errors';
import { xmlDocument } from './helpers';

const options = { rootTag: 'x_xy', visualPrefix: 'vispy' };

function validationError(xml: string): unknown {
  try {
    validateDocumentSchema(parseXmlDocument(xml), options);
  } catch (error) {
    return error;
  }
  return undefined;
}

describe('validateDocumentSchema', () => {
  it('accepts a document using only known tags and attributes', () => {
    const xml = xmlDocument({
      model: 'ok',
      defaults: '<defaults><body damping="0.1"/><geom mass="1"/></defaults>',
      worldbody: `
        <body name="a" joint="free" pos="0 0 1" quat="1 0 0 0" armature="0" damping="0">
          <geom type="box" mass="1" pos="0 0 0" dim="1 1 1"/>
        </body>`,
    });
    expect(validationError(xml)).toBeUndefined();
  });

  it('rejects an unknown tag with its path', () => {
    const error = validationError(xmlDocument({
      worldbody: '<body name="a" joint="free"><motor/></body>',
    }));
    expect(error).toBeInstanceOf(SchemaViolationError);
    expect(error).toMatchObject({ path: 'x_xy/worldbody[0]/body[0]/motor[0]' });
  });

  it('rejects an unknown root tag', () => {
    const error = validationError('<robot><options gravity="0 0 0" dt="1"/><worldbody/></robot>');
    expect(error).toBeInstanceOf(SchemaViolationError);
    expect(error).toMatchObject({ path: 'robot' });
  });

  it('rejects an attribute outside the tag whitelist', () => {
    const error = validationError(xmlDocument({
      worldbody: '<body name="a" joint="free"/><body name="b" joint="free" mass="2"/>',
    }));
    expect(error).toBeInstanceOf(SchemaViolationError);
    expect(error).toMatchObject({ path: 'x_xy/worldbody[0]/body[1]@mass' });
  });

  it('rejects an attribute named like an object prototype key', () => {
    const error = validationError(xmlDocument({
      worldbody: '<body name="a" joint="rx" __proto__="x"/>',
    }));
    expect(error).toBeInstanceOf(SchemaViolationError);
    expect(error).toMatchObject({ path: 'x_xy/worldbody[0]/body[0]@__proto__' });
  });

  it('exempts visual attributes on geoms only', () => {
    expect(validationError(xmlDocument({
      worldbody: '<body name="a" joint="free"><geom type="sphere" mass="1" pos="0 0 0" dim="1" vispy_color="1 0 0"/></body>',
    }))).toBeUndefined();

    expect(validationError(xmlDocument({
      worldbody: '<body name="a" joint="free" vispy_color="1 0 0"/>',
    }))).toBeInstanceOf(SchemaViolationError);
  });

  it('requires a key after the visual prefix', () => {
    const error = validationError(xmlDocument({
      worldbody: '<body name="a" joint="free"><geom type="sphere" vispy_="1"/></body>',
    }));
    expect(error).toMatchObject({ path: 'x_xy/worldbody[0]/body[0]/geom[0]@vispy_' });
  });

  it('rejects attributes on defaults and worldbody', () => {
    expect(validationError(xmlDocument({
      defaults: '<defaults scale="2"/>',
      worldbody: '',
    }))).toBeInstanceOf(SchemaViolationError);
  });
});
