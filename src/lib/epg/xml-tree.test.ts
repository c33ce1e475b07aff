import { describe, it, expect } from 'vitest';
import {
  childElements,
  createElement,
  EpgParseError,
  escapeXml,
  parseXml,
  serializeXml,
  textContent,
} from './xml-tree';

describe('parseXml', () => {
  it('drops indentation between elements', () => {
    const root = parseXml('<?xml version="1.0"?>\n<tv>\n  <channel id="1">\n    <display-name>One</display-name>\n  </channel>\n</tv>\n');

    expect(root.name).toBe('tv');
    expect(root.children).toHaveLength(1);
    const [channel] = childElements(root, 'channel');
    expect(channel.attributes).toEqual({ id: '1' });
    expect(textContent(childElements(channel)[0])).toBe('One');
  });

  it('keeps whitespace text in text-only and mixed elements', () => {
    const root = parseXml('<tv>\n  <title> </title>\n  <desc>a <b>b</b> <i>c</i></desc>\n</tv>');

    const [title, desc] = childElements(root);
    expect(title.children).toEqual([{ type: 'text', value: ' ' }]);
    expect(desc.children).toEqual([
      { type: 'text', value: 'a ' },
      createElement('b', {}, [{ type: 'text', value: 'b' }]),
      { type: 'text', value: ' ' },
      createElement('i', {}, [{ type: 'text', value: 'c' }]),
    ]);
  });

  it('decodes entities and reads CDATA as text', () => {
    const root = parseXml('<a t="&quot;q&quot;">1 &lt; 2<![CDATA[ & <3>]]></a>');

    expect(root.attributes.t).toBe('"q"');
    expect(root.children).toEqual([{ type: 'text', value: '1 < 2 & <3>' }]);
  });

  it('accepts a doctype and a byte order mark', () => {
    const root = parseXml('\uFEFF<!DOCTYPE tv SYSTEM "xmltv.dtd"><tv></tv>');

    expect(root.name).toBe('tv');
  });

  it('throws EpgParseError on mismatched tags', () => {
    let caught: unknown;
    try {
      parseXml('<tv>\n<a></b></tv>');
    } catch (error) {
      caught = error;
    }

    expect(caught).toBeInstanceOf(EpgParseError);
    expect(caught).toMatchObject({ name: 'EpgParseError', line: 2 });
  });

  it('throws EpgParseError on truncated or empty documents', () => {
    expect(() => parseXml('<tv><channel id="1">')).toThrow(EpgParseError);
    expect(() => parseXml('')).toThrow(EpgParseError);
  });
});

describe('escapeXml', () => {
  it('escapes markup characters', () => {
    expect(escapeXml(`<a href="x">Tom & Jerry's</a>`)).toBe(
      '&lt;a href=&quot;x&quot;&gt;Tom &amp; Jerry&apos;s&lt;/a&gt;'
    );
  });
});

describe('serializeXml', () => {
  it('writes text-only elements inline', () => {
    const element = createElement('a', { k: 'v&' }, [{ type: 'text', value: "it's" }]);

    expect(serializeXml(element, { declaration: false })).toBe('<a k="v&amp;">it&apos;s</a>');
  });

  it('indents element content and writes mixed content on one line', () => {
    const root = createElement('tv', {}, [
      createElement('p', {}, [{ type: 'text', value: 'hi' }, createElement('b', {}, [{ type: 'text', value: 'x' }])]),
      createElement('empty'),
    ]);

    expect(serializeXml(root)).toBe(
      [
        '<?xml version="1.0" encoding="UTF-8"?>',
        '<tv>',
        '  <p>hi<b>x</b></p>',
        '  <empty />',
        '</tv>',
      ].join('\n')
    );
  });

  it('keeps whitespace-only text', () => {
    const root = parseXml('<tv><title> </title><desc>a <b>b</b> <i>c</i></desc></tv>');

    expect(serializeXml(root, { declaration: false })).toBe(
      ['<tv>', '  <title> </title>', '  <desc>a <b>b</b> <i>c</i></desc>', '</tv>'].join('\n')
    );
  });

  it('parses back to the same tree', () => {
    const source = '<tv><c id="1"><n lang="ru">Первый &amp; второй</n></c></tv>';

    expect(parseXml(serializeXml(parseXml(source)))).toEqual(parseXml(source));
  });
});
