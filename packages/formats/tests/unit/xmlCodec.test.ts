import { describe, it, expect } from 'vitest';
import { parseXmlRecords, renderXml } from '../../src/infrastructure/xml/xmlCodec.js';

describe('parseXmlRecords', () => {
  it('should detect the record element and read fields in order', () => {
    const records = parseXmlRecords(
      '<people><person><name>Ada</name><age>36</age></person><person><name>Grace</name></person></people>',
    );

    expect(records.map((record) => Object.fromEntries(record))).toEqual([
      { name: 'Ada', age: '36' },
      { name: 'Grace' },
    ]);
  });

  it('should read attributes, empty elements and entities', () => {
    const records = parseXmlRecords(
      `<?xml version="1.0"?>
      <!-- export -->
      <data><row id='7'><note>a &lt; b &amp;&#38; c</note><empty/><blank></blank></row></data>`,
    );

    expect(Object.fromEntries(records[0] ?? new Map())).toEqual({
      id: '7',
      note: 'a < b && c',
      empty: null,
      blank: null,
    });
  });

  it('should decode hexadecimal character references', () => {
    const records = parseXmlRecords('<data><row><name>caf&#xE9;</name><mark>&#x3c;</mark></row></data>');
    expect(records[0]?.get('name')).toBe('café');
    expect(records[0]?.get('mark')).toBe('<');
  });

  it('should honour an explicit record tag', () => {
    const records = parseXmlRecords('<root><meta>x</meta><item><v>1</v></item><item><v>2</v></item></root>', 'item');
    expect(records).toHaveLength(2);
  });

  it('should flatten nested elements to their text', () => {
    const records = parseXmlRecords('<data><row><address><city>Porto</city></address></row></data>');
    expect(records[0]?.get('address')).toBe('Porto');
  });

  it('should return no records for an empty document', () => {
    expect(parseXmlRecords('   ')).toEqual([]);
  });
});

describe('renderXml', () => {
  const options = { rootName: 'data', rowName: 'row', xmlDeclaration: true, encoding: 'utf-8', pretty: true };

  it('should render one element per row with escaped text and empty nulls', () => {
    expect(renderXml(['foo', 'bar'], [['a & b', null]], options)).toBe(
      [
        "<?xml version='1.0' encoding='utf-8'?>",
        '<data>',
        '  <row>',
        '    <foo>a &amp; b</foo>',
        '    <bar/>',
        '  </row>',
        '</data>',
        '',
      ].join('\n'),
    );
  });

  it('should render compactly when pretty is off', () => {
    expect(renderXml(['n'], [[1]], { ...options, xmlDeclaration: false, pretty: false })).toBe(
      '<data><row><n>1</n></row></data>',
    );
  });

  it('should reject names that are not XML element names', () => {
    expect(() => renderXml(['first name'], [], options)).toThrow("'first name' is not a valid XML element name");
  });
});
