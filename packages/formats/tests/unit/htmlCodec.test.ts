import { describe, it, expect } from 'vitest';
import { parseHtmlTables, renderHtmlTable, tableText } from '../../src/infrastructure/html/htmlCodec.js';

describe('parseHtmlTables', () => {
  it('should separate the thead row from body rows', () => {
    const [table] = parseHtmlTables(
      '<table><thead><tr><th>a</th><th>b</th></tr></thead><tbody><tr><td>1</td><td>x&nbsp;y</td></tr></tbody></table>',
    );

    expect(table).toEqual({ head: ['a', 'b'], rows: [['1', 'x y']] });
  });

  it('should leave head null when there is no thead', () => {
    const [table] = parseHtmlTables('<TABLE><TR><TH>k</TH></TR><TR><TD><b>v</b></TD></TR></TABLE>');
    expect(table).toEqual({ head: null, rows: [['k'], ['v']] });
  });

  it('should return every table in document order', () => {
    const tables = parseHtmlTables('<table><tr><td>1</td></tr></table><p/><table><tr><td>2</td></tr></table>');
    expect(tables.map(tableText)).toEqual(['1', '2']);
  });

  it('should decode numeric entities', () => {
    const [table] = parseHtmlTables('<table><tr><td>&#65;&#x42;</td></tr></table>');
    expect(table?.rows).toEqual([['AB']]);
  });
});

describe('renderHtmlTable', () => {
  it('should render a dataframe-style table', () => {
    const html = renderHtmlTable(['col1', 'col2'], [[1, null]], {
      border: 1,
      classes: ['wide'],
      tableId: 't1',
      header: true,
      naRep: 'NaN',
    });

    expect(html).toBe(
      [
        '<table border="1" class="dataframe wide" id="t1">',
        '  <thead>',
        '    <tr style="text-align: right;">',
        '      <th>col1</th>',
        '      <th>col2</th>',
        '    </tr>',
        '  </thead>',
        '  <tbody>',
        '    <tr>',
        '      <td>1</td>',
        '      <td>NaN</td>',
        '    </tr>',
        '  </tbody>',
        '</table>',
        '',
      ].join('\n'),
    );
  });

  it('should omit the header when asked', () => {
    const html = renderHtmlTable(['a'], [], { border: 0, classes: [], header: false, naRep: '' });
    expect(html).toBe('<table border="0" class="dataframe">\n  <tbody>\n  </tbody>\n</table>\n');
  });
});
