import { describe, it, expect } from 'vitest';
import { createHeadCollector, dedupeKey, escapeHtml, renderAttributes, renderTag } from '../head.js';

describe('createHeadCollector', () => {
  it('renders nothing when nothing was declared', () => {
    expect(createHeadCollector().renderHead()).toBe('');
  });

  it('renders the title first, escaped', () => {
    const head = createHeadCollector();
    head.addTag({ tag: 'meta', attributes: { name: 'description', content: 'Front page' } });
    head.setTitle('News & <Views>');
    expect(head.renderHead()).toBe(
      '<title data-hearth-head="">News &amp; &lt;Views&gt;</title>\n' +
        '  <meta name="description" content="Front page" data-hearth-head="">',
    );
  });

  it('keeps the last title set', () => {
    const head = createHeadCollector();
    head.setTitle('Hearth News');
    head.setTitle('Story 3 | Hearth News');
    expect(head.getTitle()).toBe('Story 3 | Hearth News');
  });

  it('replaces a meta tag with the same name, moving it to the latest position', () => {
    const head = createHeadCollector();
    head.addTag({ tag: 'meta', attributes: { name: 'description', content: 'Layout default' } });
    head.addTag({ tag: 'link', attributes: { rel: 'icon', href: '/favicon.ico' } });
    head.addTag({ tag: 'meta', attributes: { name: 'description', content: 'A story' } });

    expect(head.getTags()).toEqual([
      { tag: 'link', attributes: { rel: 'icon', href: '/favicon.ico' } },
      { tag: 'meta', attributes: { name: 'description', content: 'A story' } },
    ]);
  });

  it('appends tags that carry no identity', () => {
    const head = createHeadCollector();
    head.addTag({ tag: 'link', attributes: { rel: 'stylesheet', href: '/a.css' } });
    head.addTag({ tag: 'link', attributes: { rel: 'stylesheet', href: '/a.css' } });
    expect(head.getTags()).toHaveLength(2);
  });

  it('replaces tags by explicit key', () => {
    const head = createHeadCollector();
    head.addTag({ tag: 'script', key: 'analytics', content: 'track(1)' });
    head.addTag({ tag: 'script', key: 'analytics', content: 'track(2)' });
    expect(head.renderHead()).toBe('<script data-hearth-head="">track(2)</script>');
  });

  it('merges html and body attributes, later values winning', () => {
    const head = createHeadCollector();
    head.setHtmlAttributes({ lang: 'en', dir: 'ltr' });
    head.setHtmlAttributes({ lang: 'fr' });
    head.setBodyAttributes({ class: 'story' });
    expect(head.getHtmlAttributes()).toEqual({ lang: 'fr', dir: 'ltr' });
    expect(head.getBodyAttributes()).toEqual({ class: 'story' });
  });
});

describe('dedupeKey', () => {
  it('derives keys for identifiable tags', () => {
    expect(dedupeKey({ tag: 'meta', attributes: { charset: 'utf-8' } })).toBe('meta:charset');
    expect(dedupeKey({ tag: 'meta', attributes: { property: 'og:title', content: 'x' } })).toBe('meta:property:og:title');
    expect(dedupeKey({ tag: 'meta', attributes: { 'http-equiv': 'refresh', content: '5' } })).toBe('meta:http-equiv:refresh');
    expect(dedupeKey({ tag: 'link', attributes: { rel: 'canonical', href: '/a' } })).toBe('link:canonical');
    expect(dedupeKey({ tag: 'base', attributes: { href: '/' } })).toBe('base');
    expect(dedupeKey({ tag: 'style', key: 'theme' })).toBe('key:theme');
  });

  it('returns null for tags that always append', () => {
    expect(dedupeKey({ tag: 'link', attributes: { rel: 'preconnect', href: 'https://cdn.test' } })).toBeNull();
    expect(dedupeKey({ tag: 'script', attributes: { src: '/x.js' } })).toBeNull();
  });
});

describe('renderTag', () => {
  it('renders void tags without a closing tag', () => {
    expect(renderTag({ tag: 'link', attributes: { rel: 'canonical', href: '/stories/3' } })).toBe(
      '<link rel="canonical" href="/stories/3" data-hearth-head="">',
    );
  });

  it('emits script content as given', () => {
    expect(renderTag({ tag: 'script', attributes: { type: 'application/ld+json' }, content: '{"a":1}' })).toBe(
      '<script type="application/ld+json" data-hearth-head="">{"a":1}</script>',
    );
  });
});

describe('renderAttributes', () => {
  it('renders booleans as bare names and skips false or undefined', () => {
    expect(renderAttributes({ async: true, defer: false, src: '/a.js', nonce: undefined, width: 10 })).toBe(
      'async src="/a.js" width="10"',
    );
  });

  it('skips invalid attribute names', () => {
    expect(renderAttributes({ 'onload="x"': 'y', title: 'ok' })).toBe('title="ok"');
  });

  it('escapes values', () => {
    expect(renderAttributes({ content: `"quoted" & 'single'` })).toBe(
      'content="&quot;quoted&quot; &amp; &#39;single&#39;"',
    );
  });
});

describe('escapeHtml', () => {
  it('escapes the five HTML special characters', () => {
    expect(escapeHtml(`<a href="x">Tom & Jerry's</a>`)).toBe(
      '&lt;a href=&quot;x&quot;&gt;Tom &amp; Jerry&#39;s&lt;/a&gt;',
    );
  });
});
