import { describe, expect, it } from 'vitest';
import { repairTruncatedJson } from '../jsonRepair.js';

describe('repairTruncatedJson', () => {
  it('returns valid JSON untouched', () => {
    const text = '{"new_role_classes": [], "role_individuals": []}';

    expect(repairTruncatedJson(text)).toEqual({ text, repaired: false, keptChars: text.length, totalChars: text.length });
  });

  it('strips a code fence around otherwise valid JSON', () => {
    const result = repairTruncatedJson('```json\n{"a": 1}\n```');

    expect(result.text).toBe('{"a": 1}');
    expect(result.repaired).toBe(false);
  });

  it('keeps the complete elements of a truncated array inside an object', () => {
    const text = '{"new_role_classes": [{"label": "A"}, {"label": "B"}, {"label": "C", "defin';

    const result = repairTruncatedJson(text);

    expect(result.repaired).toBe(true);
    expect(result.text).toBe('{"new_role_classes": [{"label": "A"}, {"label": "B"}\n]\n}');
    expect(JSON.parse(result.text)).toEqual({ new_role_classes: [{ label: 'A' }, { label: 'B' }] });
    expect(result.totalChars).toBe(text.length);
  });

  it('repairs a truncated top-level array', () => {
    const result = repairTruncatedJson('[{"a": 1}, {"a": 2}, {"a"');

    expect(JSON.parse(result.text)).toEqual([{ a: 1 }, { a: 2 }]);
  });

  it('ignores braces inside string literals', () => {
    const result = repairTruncatedJson('{"x": [{"t": "a } b"}, {"t": "c');

    expect(JSON.parse(result.text)).toEqual({ x: [{ t: 'a } b' }] });
  });

  it('gives up when no element ever closed', () => {
    const text = 'not json at all {';

    expect(repairTruncatedJson(text)).toEqual({ text, repaired: false, keptChars: 0, totalChars: text.length });
  });
});
