import os from 'os';
import { ClassName } from '../models/class-name.js';
import { parseClassInfo } from '../services/class-info-parser.js';
import { JavadocArchive } from '../services/javadoc-archive.js';
import { XmlNode } from '../services/xml-node.js';
import { MemoryTree } from './helpers.js';

describe('parseClassInfo', () => {
  let archive: JavadocArchive;

  beforeEach(async () => {
    archive = await JavadocArchive.open(os.tmpdir(), async () => new MemoryTree({
      '/info.xml': '<info baseUrl="http://docs/" />',
    }));
  });

  const parse = async (xml: string, fullName = 'com.example.Color') =>
    parseClassInfo(await XmlNode.parse(xml), ClassName.parse(fullName), archive);

  test('should parse an enum with constructors', async () => {
    const info = await parse(`
      <class modifiers="public enum" since="1.5" superClass="java.lang.Enum" deprecated="true">
        <description/>
        <constructor modifiers="private">
          <parameter type="int" name="rgb"/>
          <description>Creates a color.</description>
        </constructor>
        <constructor modifiers="private" deprecated="true"/>
      </class>`);

    expect(info?.kind).toBe('enum');
    expect(info?.modifiers).toEqual(['public']);
    expect(info?.since).toBe('1.5');
    expect(info?.superClass).toBe('java.lang.Enum');
    expect(info?.deprecated).toBe(true);
    expect(info?.description).toBeUndefined();
    expect(info?.documentationUrl).toBe('http://docs/com/example/Color.html');
    expect(info?.constructors).toEqual([
      {
        name: 'Color',
        parameters: [{ name: 'rgb', type: 'int' }],
        modifiers: ['private'],
        deprecated: false,
        description: 'Creates a color.',
      },
      {
        name: 'Color',
        parameters: [],
        modifiers: ['private'],
        deprecated: true,
      },
    ]);
    expect(info?.constructors[0]).not.toHaveProperty('returnType');
  });

  test('should map @interface to the annotation kind', async () => {
    const info = await parse('<class modifiers="public @interface"/>', 'com.example.Marker');
    expect(info?.kind).toBe('annotation');
    expect(info?.modifiers).toEqual(['public']);
  });

  test('should default to the class kind', async () => {
    const info = await parse('<class modifiers="public"><description></description></class>');
    expect(info?.kind).toBe('class');
    expect(info?.modifiers).toEqual(['public']);
    expect(info?.description).toBeUndefined();
  });

  test('should leave missing attributes absent', async () => {
    const info = await parse('<class modifiers="public class"/>');
    expect(info?.since).toBeUndefined();
    expect(info?.superClass).toBeUndefined();
    expect(info?.deprecated).toBe(false);
    expect(info?.interfaces).toEqual([]);
    expect(info?.constructors).toEqual([]);
    expect(info?.methods).toEqual([]);
  });

  test('should default the return type to void', async () => {
    const info = await parse('<class modifiers="public class"><method name="reset" modifiers="public"/></class>');
    expect(info?.methods[0].returnType).toBe('void');
  });

  test('should return undefined without a class element', async () => {
    await expect(parse('<record modifiers="public class"/>')).resolves.toBeUndefined();
  });
});
