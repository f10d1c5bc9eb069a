import { describe, it, expect, vi } from 'vitest';
import {
  allAttr,
  allText,
  attrAt,
  exists,
  extractField,
  extractOr,
  findContainers,
  loadDocument,
  ownText,
  textAt,
  type ExtractionStrategy,
} from '../../../src/extraction/FieldExtractor';

const html = `
  <div class="card">
    <h3 class="title">   Backend   Intern </h3>
    <span class="empty">   </span>
    <a class="link" href="">blank</a>
    <a class="link" href="/detail/12345">Detail</a>
    <ul class="skills"><li>Node.js</li><li>  </li><li>SQL
      databases</li></ul>
  </div>
  <div class="card"><h3 class="title">Second</h3></div>`;

describe('FieldExtractor', () => {
  describe('extractField', () => {
    it('should return the value of the first matching strategy and stop there', () => {
      const ctx = loadDocument(html);
      const strategies = [0, 1, 2, 3, 4].map((i) =>
        vi.fn<ExtractionStrategy<string>>(() => (i === 2 ? 'third' : undefined))
      );

      const result = extractField(ctx, strategies);

      expect(result).toEqual({ found: true, value: 'third', strategyIndex: 2 });
      expect(strategies[0]).toHaveBeenCalledTimes(1);
      expect(strategies[1]).toHaveBeenCalledTimes(1);
      expect(strategies[2]).toHaveBeenCalledTimes(1);
      expect(strategies[3]).not.toHaveBeenCalled();
      expect(strategies[4]).not.toHaveBeenCalled();
    });

    it('should report absence when no strategy matches', () => {
      const ctx = loadDocument(html);

      expect(extractField(ctx, [textAt('.missing'), textAt('.empty')])).toEqual({ found: false });
      expect(extractField(ctx, [])).toEqual({ found: false });
    });

    it('should accept falsy values other than undefined', () => {
      const ctx = loadDocument(html);

      expect(extractField<number>(ctx, [() => 0])).toEqual({ found: true, value: 0, strategyIndex: 0 });
    });
  });

  describe('extractOr', () => {
    it('should fall back when every strategy misses', () => {
      const ctx = loadDocument(html);

      expect(extractOr(ctx, [textAt('.missing')], 'n/a')).toBe('n/a');
      expect(extractOr(ctx, [textAt('.missing'), textAt('.title')], 'n/a')).toBe('Backend   Intern');
    });
  });

  describe('strategies', () => {
    it('textAt should trim the first match and skip blank text', () => {
      const ctx = loadDocument(html);

      expect(textAt('.title')(ctx)).toBe('Backend   Intern');
      expect(textAt('.empty')(ctx)).toBeUndefined();
    });

    it('attrAt should return the first non-empty attribute', () => {
      const ctx = loadDocument(html);

      expect(attrAt('a.link', 'href')(ctx)).toBe('/detail/12345');
      expect(attrAt('a.link', 'data-id')(ctx)).toBeUndefined();
    });

    it('allText should collapse whitespace and drop empty entries', () => {
      const ctx = loadDocument(html);

      expect(allText('.skills li')(ctx)).toEqual(['Node.js', 'SQL databases']);
      expect(allText('.missing li')(ctx)).toBeUndefined();
    });

    it('allAttr should collect non-empty attributes', () => {
      const ctx = loadDocument(html);

      expect(allAttr('a.link', 'href')(ctx)).toEqual(['/detail/12345']);
    });

    it('exists should be true or undefined', () => {
      const ctx = loadDocument(html);

      expect(exists('.skills')(ctx)).toBe(true);
      expect(exists('.startup')(ctx)).toBeUndefined();
    });

    it('ownText should read the scoped element', () => {
      const ctx = loadDocument('<p>  hello  </p>');

      expect(ownText()(ctx)).toBe('hello');
    });
  });

  describe('findContainers', () => {
    it('should use the first selector that matches anything', () => {
      const ctx = loadDocument(html);

      const result = findContainers(ctx, ['.result', '.card', 'div']);

      expect(result.selector).toBe('.card');
      expect(result.elements).toHaveLength(2);
    });

    it('should return no elements when nothing matches', () => {
      const ctx = loadDocument(html);

      expect(findContainers(ctx, ['.result'])).toEqual({ elements: [] });
    });
  });
});
