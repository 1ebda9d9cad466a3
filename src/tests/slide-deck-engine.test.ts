/**
 * Tests for SlideDeckEngine — parse/render pipeline, title slide, front matter.
 */
import { describe, it, expect, vi, afterEach } from 'vitest';
import { renderDeck, SlideDeckEngine } from '../engine/SlideDeckEngine';
import type { SectionRuleContext, TextRuleContext } from '../render/RenderRuleRegistry';
import { ConfigurationError, StructuralParseError } from '../deck/errors';

const FIRST_SLIDE =
  '<section class="slide" id="section-1" data-number="1">\n<h1>A</h1>\n</section>\n';

afterEach(() => {
  vi.restoreAllMocks();
});

describe('SlideDeckEngine', () => {
  it('renders a title slide from front matter before the sections', () => {
    const engine = new SlideDeckEngine();
    const result = engine.render(
      [
        '---',
        'title: My *Talk*',
        'subtitle: Sub',
        'date: 2024-05-01',
        'authors:',
        '  - Ada',
        '  - name: Bob',
        '    url: https://bob.test',
        '  - name: Cy',
        '    email: cy@example.com',
        '---',
        '* A',
      ].join('\n'),
    );

    expect(result.html).toBe(
      '<section class="slide title-slide">\n' +
        '<h1>My <em>Talk</em></h1>\n' +
        '<h2>Sub</h2>\n' +
        '<p class="date">2024-05-01</p>\n' +
        '<p class="author">Ada</p>\n' +
        '<p class="author"><a href="https://bob.test">Bob</a></p>\n' +
        '<p class="author"><a href="mailto:cy@example.com">Cy</a></p>\n' +
        '</section>\n' +
        FIRST_SLIDE,
    );
    expect(result.metadata).toEqual({
      title: 'My *Talk*',
      subtitle: 'Sub',
      date: '2024-05-01',
      tags: [],
      authors: [
        { name: 'Ada' },
        { name: 'Bob', url: 'https://bob.test' },
        { name: 'Cy', email: 'cy@example.com' },
      ],
    });
    expect(result.document.sections[0]?.line).toBe(12);
  });

  it('skips the title slide when disabled or untitled', () => {
    const source = '---\ntitle: T\n---\n* A\n';
    const engine = new SlideDeckEngine({
      render: { lineBreak: '<br>\n', titleSlide: false },
    });
    expect(engine.render(source).html).toBe(FIRST_SLIDE);
    expect(new SlideDeckEngine().render('---\ntags: [x]\n---\n* A\n').html).toBe(
      FIRST_SLIDE,
    );
  });

  it('renders decks without front matter', () => {
    const result = new SlideDeckEngine().render('* A\n');
    expect(result.html).toBe(FIRST_SLIDE);
    expect(result.metadata).toBeNull();
  });

  it('logs and drops front matter that does not parse', () => {
    const warn = vi.spyOn(console, 'warn').mockImplementation(() => {});
    const result = new SlideDeckEngine().render('---\ntitle: [unclosed\n---\n* A\n');
    expect(result.metadata).toBeNull();
    expect(result.html).toBe(FIRST_SLIDE);
    expect(result.document.sections[0]?.line).toBe(4);
    expect(warn.mock.calls[0]?.[0]).toBe('Failed to parse front matter:');
  });

  it('logs and drops front matter that is not deck metadata', () => {
    const warn = vi.spyOn(console, 'warn').mockImplementation(() => {});
    const result = new SlideDeckEngine().render('---\ntags: 5\n---\n* A\n');
    expect(result.metadata).toBeNull();
    expect(warn.mock.calls[0]?.[0]).toBe(
      'Ignoring front matter that does not describe a deck:',
    );
  });

  it('propagates structural errors', () => {
    expect(() => new SlideDeckEngine().render('* A\n.video clip.mp4\n')).toThrow(
      StructuralParseError,
    );
  });

  it('renders with caller supplied rules', () => {
    const engine = new SlideDeckEngine(undefined, {
      rules: {
        section: ({ formattedNumber, body }) => `${formattedNumber}{${body}}`,
        text: ({ content }) => content,
      },
    });
    expect(engine.renderDocument(engine.parse('* A\nhi\n** B\n').document)).toBe(
      '1{hi1.1{}}',
    );
  });

  it('renders front matter with caller supplied rules', () => {
    const rules = {
      section: ({ formattedNumber, title, body }: SectionRuleContext) =>
        `SEC(${formattedNumber} ${title}|${body})`,
      text: ({ content }: TextRuleContext) => `TEXT(${content})`,
    };
    const source = '---\ntitle: Talk\n---\n* A\nhi\n';

    let caught: unknown;
    try {
      new SlideDeckEngine(undefined, { rules }).render(source);
    } catch (error) {
      caught = error;
    }
    expect(caught).toBeInstanceOf(ConfigurationError);
    expect(caught).toMatchObject({ missingKinds: ['titleSlide'] });

    const titled = new SlideDeckEngine(undefined, {
      rules: { ...rules, titleSlide: ({ title }) => `TITLE(${title})` },
    });
    expect(titled.render(source).html).toBe('TITLE(Talk)SEC(1 A|TEXT(hi))');

    const untitled = new SlideDeckEngine(
      { render: { lineBreak: '<br>\n', titleSlide: false } },
      { rules },
    );
    expect(untitled.render(source).html).toBe('SEC(1 A|TEXT(hi))');
  });

  it('keeps refused author URLs out of the title slide', () => {
    const html = new SlideDeckEngine().render(
      '---\ntitle: T\nauthors:\n  - name: Eve\n    url: javascript:alert(1)\n---\n* A\n',
    ).html;
    expect(html).toBe(
      '<section class="slide title-slide">\n<h1>T</h1>\n<p class="author">Eve</p>\n</section>\n' +
        FIRST_SLIDE,
    );
  });

  it('forwards style warnings to the handler', () => {
    const onStyleWarning = vi.fn();
    new SlideDeckEngine(undefined, { onStyleWarning }).render('* A\nx * y\n');
    expect(onStyleWarning).toHaveBeenCalledTimes(1);
  });

  it('rebuilds its pipeline on updateConfig', () => {
    const engine = new SlideDeckEngine();
    engine.updateConfig({ render: { lineBreak: ' ', titleSlide: true } });
    expect(engine.render('* A\none\ntwo\n').html).toContain('<p>one two</p>\n');
  });
});

describe('renderDeck', () => {
  it('renders deck text in one call', () => {
    expect(renderDeck('* A\n')).toBe(FIRST_SLIDE);
  });
});
