/**
 * Tests for InlineStyler — emphasis, escapes, deck links, unmatched delimiters.
 */
import { describe, it, expect, vi, afterEach } from 'vitest';
import { StyleEngineWarning } from '../deck/errors';
import { InlineStyler } from '../markdown/InlineStyler';

const style = {
  enableTypographer: false,
  enableLinkify: false,
  openLinksInNewTab: true,
};

function quietStyler() {
  const onWarning = vi.fn<[StyleEngineWarning], void>();
  return { styler: new InlineStyler(undefined, { onWarning }), onWarning };
}

afterEach(() => {
  vi.restoreAllMocks();
});

describe('InlineStyler', () => {
  it('is the identity on plain text', () => {
    const { styler, onWarning } = quietStyler();
    expect(styler.style('Hello, world 42')).toBe('Hello, world 42');
    expect(styler.style('')).toBe('');
    expect(onWarning).not.toHaveBeenCalled();
  });

  it('renders emphasis, strong and code', () => {
    const { styler } = quietStyler();
    expect(styler.style('*em* and **strong**')).toBe(
      '<em>em</em> and <strong>strong</strong>',
    );
    expect(styler.style('_em_')).toBe('<em>em</em>');
    expect(styler.style('`code <b>`')).toBe('<code>code &lt;b&gt;</code>');
  });

  it('renders markdown links', () => {
    const { styler } = quietStyler();
    expect(styler.style('[label](https://example.com)')).toBe(
      '<a href="https://example.com">label</a>',
    );
  });

  it('escapes raw HTML', () => {
    const { styler } = quietStyler();
    expect(styler.style('<b>x</b> & y')).toBe('&lt;b&gt;x&lt;/b&gt; &amp; y');
  });

  it('honors backslash escapes without warning', () => {
    const { styler, onWarning } = quietStyler();
    expect(styler.style('\\*not em\\*')).toBe('*not em*');
    expect(onWarning).not.toHaveBeenCalled();
  });

  it('renders deck links', () => {
    const { styler } = quietStyler();
    expect(styler.style('go to [[https://example.com]]')).toBe(
      'go to <a href="https://example.com" target="_blank">https://example.com</a>',
    );
    expect(styler.style('[[https://example.com][Example]] now')).toBe(
      '<a href="https://example.com" target="_blank">Example</a> now',
    );
  });

  it('leaves the target out when links stay in the same tab', () => {
    const styler = new InlineStyler(
      { style: { ...style, openLinksInNewTab: false } },
      { onWarning: vi.fn() },
    );
    expect(styler.style('[[https://example.com]]')).toBe(
      '<a href="https://example.com">https://example.com</a>',
    );
  });

  it('reports unmatched delimiters and renders them literally', () => {
    const { styler, onWarning } = quietStyler();
    expect(styler.style('a * b')).toBe('a * b');
    expect(onWarning).toHaveBeenCalledTimes(1);
    const warning = onWarning.mock.calls[0]?.[0];
    expect(warning).toBeInstanceOf(StyleEngineWarning);
    expect(warning?.sequence).toBe('*');
    expect(warning?.source).toBe('a * b');
    expect(warning?.message).toBe('unrecognized inline markup "*" in "a * b"');
  });

  it('reports "**" once rather than also as "*"', () => {
    const { styler, onWarning } = quietStyler();
    expect(styler.style('**bold')).toBe('**bold');
    expect(onWarning.mock.calls.map(([w]) => w.sequence)).toEqual(['**']);
  });

  it('reports an unclosed backtick', () => {
    const { styler, onWarning } = quietStyler();
    expect(styler.style('`open')).toBe('`open');
    expect(onWarning.mock.calls.map(([w]) => w.sequence)).toEqual(['`']);
  });

  it('refuses deck links to unsafe URLs', () => {
    const { styler, onWarning } = quietStyler();
    expect(styler.style('[[javascript:alert(1)]]')).toBe('[[javascript:alert(1)]]');
    expect(onWarning.mock.calls.map(([w]) => w.sequence)).toEqual(['[[']);
  });

  it('logs warnings with console.warn by default', () => {
    const warn = vi.spyOn(console, 'warn').mockImplementation(() => {});
    new InlineStyler().style('a * b');
    expect(warn).toHaveBeenCalledWith(
      'Inline style warning:',
      'unrecognized inline markup "*" in "a * b"',
    );
  });

  it('applies typographer settings', () => {
    const styler = new InlineStyler({ style: { ...style, enableTypographer: true } });
    expect(styler.style('"quoted"')).toBe('“quoted”');
  });

  it('rebuilds its markdown-it instance on updateConfig', () => {
    const styler = new InlineStyler(undefined, { onWarning: vi.fn() });
    const before = styler.getMarkdownIt();
    styler.updateConfig({ style: { ...style, openLinksInNewTab: false } });
    expect(styler.getMarkdownIt()).not.toBe(before);
    expect(styler.style('[[https://example.com][x]]')).toBe(
      '<a href="https://example.com">x</a>',
    );
  });
});
