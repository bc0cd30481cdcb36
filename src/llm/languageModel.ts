export interface MediaAttachment {
  mimeType: string;
  /** Raw file contents */
  data: Buffer;
}

/**
 * @description Text-generation backend. Gemini in production; tests pass a
 * scripted implementation.
 */
export interface LanguageModel {
  readonly name: string;
  generate(prompt: string, attachments?: MediaAttachment[]): Promise<string>;
}

/**
 * @description Parse a JSON object out of a model reply, unwrapping a
 * ```json fenced block (or a bare ``` block) when present.
 * Throws SyntaxError when no JSON can be parsed.
 */
export function extractJson(text: string): unknown {
  let body = text.trim();
  if (body.includes('```json')) {
    body = body.split('```json')[1].split('```')[0].trim();
  } else if (body.includes('```')) {
    body = body.split('```')[1].split('```')[0].trim();
  }
  return JSON.parse(body);
}

export function checkIsRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/** String field or null; empty strings and the literal "null" count as absent */
export function readString(record: Record<string, unknown>, key: string): string | null {
  const value = record[key];
  if (typeof value !== 'string') return null;
  const trimmed = value.trim();
  return trimmed && trimmed.toLowerCase() !== 'null' ? trimmed : null;
}

export function readNumber(record: Record<string, unknown>, key: string): number | null {
  const value = record[key];
  if (typeof value === 'number' && Number.isFinite(value)) return value;
  if (typeof value === 'string' && value.trim() !== '' && Number.isFinite(Number(value))) return Number(value);
  return null;
}
