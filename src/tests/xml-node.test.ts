import { XmlNode } from '../services/xml-node.js';

describe('XmlNode', () => {
  const xml = '<info name="jsoup"><item>one</item><item id="2">two</item><group><item>nested</item></group></info>';

  test('should select the root element', async () => {
    const document = await XmlNode.parse(xml);
    const info = document.selectFirst('/info');
    expect(info?.name).toBe('info');
    expect(info?.attribute('name')).toBe('jsoup');
  });

  test('should return an empty string for missing attributes', async () => {
    const document = await XmlNode.parse(xml);
    expect(document.selectFirst('/info')?.attribute('version')).toBe('');
  });

  test('should list children in document order', async () => {
    const document = await XmlNode.parse(xml);
    const items = document.selectFirst('/info')?.children('item') ?? [];
    expect(items.map(item => item.text())).toEqual(['one', 'two']);
    expect(items[1].attribute('id')).toBe('2');
  });

  test('should follow multi-step paths', async () => {
    const document = await XmlNode.parse(xml);
    expect(document.selectFirst('/info/group/item')?.text()).toBe('nested');
    expect(document.selectFirst('/info')?.selectFirst('item')?.text()).toBe('one');
  });

  test('should return undefined for paths that do not match', async () => {
    const document = await XmlNode.parse(xml);
    expect(document.selectFirst('/class')).toBeUndefined();
    expect(document.selectFirst('/info/missing')).toBeUndefined();
  });

  test('should handle empty elements', async () => {
    const document = await XmlNode.parse('<info/>');
    const info = document.selectFirst('/info');
    expect(info).toBeDefined();
    expect(info?.attribute('name')).toBe('');
    expect(info?.text()).toBe('');
    expect(info?.children('item')).toEqual([]);
  });

  test('should reject malformed XML', async () => {
    await expect(XmlNode.parse('<info><item></info>')).rejects.toThrow();
  });
});
