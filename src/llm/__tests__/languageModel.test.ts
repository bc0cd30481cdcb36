import { checkIsRecord, extractJson, readNumber, readString } from '../languageModel';

describe('extractJson', () => {
  it('should unwrap a json fenced block', () => {
    expect(extractJson('Here you go:\n```json\n{"a": 1}\n```\nDone')).toEqual({ a: 1 });
  });

  it('should unwrap a bare fenced block', () => {
    expect(extractJson('```\n{"b": "x"}\n```')).toEqual({ b: 'x' });
  });

  it('should parse plain JSON', () => {
    expect(extractJson('  {"c": null} ')).toEqual({ c: null });
  });

  it('should throw on text without JSON', () => {
    expect(() => extractJson('I cannot help with that')).toThrow(SyntaxError);
  });
});

describe('record readers', () => {
  const record = { name: '  Gym  ', empty: '', literal: 'null', score: 7, text: '8', bad: 'eight' };

  it('should only accept plain objects as records', () => {
    expect(checkIsRecord(record)).toBe(true);
    expect(checkIsRecord([1])).toBe(false);
    expect(checkIsRecord(null)).toBe(false);
  });

  it('should trim strings and treat empty or "null" as absent', () => {
    expect(readString(record, 'name')).toBe('Gym');
    expect(readString(record, 'empty')).toBeNull();
    expect(readString(record, 'literal')).toBeNull();
    expect(readString(record, 'score')).toBeNull();
  });

  it('should read numbers and numeric strings', () => {
    expect(readNumber(record, 'score')).toBe(7);
    expect(readNumber(record, 'text')).toBe(8);
    expect(readNumber(record, 'bad')).toBeNull();
    expect(readNumber(record, 'missing')).toBeNull();
  });
});
