/**
 * Mock data generation from JSON templates.
 *
 * A template is any JSON value. String values of the form `{{kind}}` are
 * placeholders replaced by a value derived from the item index; everything
 * else is copied. Output is deterministic for a given template and index.
 */

import { ValidationError } from '../../gateway/errors.js';

export type MockType = 'object' | 'list' | 'api_response';

export type JsonValue =
  | string
  | number
  | boolean
  | null
  | JsonValue[]
  | { [key: string]: JsonValue };

export interface MockOptions {
  /** Items for `list` (default 3) */
  count?: number | undefined;
  /** HTTP status for `api_response` (default 200) */
  statusCode?: number | undefined;
}

const PLACEHOLDER = /^\{\{\s*([a-z_]+)\s*\}\}$/;

const SAMPLE_NAMES = [
  'Ada Lovelace',
  'Alan Turing',
  'Grace Hopper',
  'Edsger Dijkstra',
  'Barbara Liskov',
  'Donald Knuth',
  'Margaret Hamilton',
  'Ken Thompson',
];

type Generator = (index: number, key: string) => JsonValue;

const GENERATORS = new Map<string, Generator>([
  ['string', (index, key) => `${key}_${String(index + 1)}`],
  ['number', (index) => (index + 1) * 10.5],
  ['integer', (index) => index + 1],
  ['boolean', (index) => index % 2 === 0],
  ['uuid', (index) => `00000000-0000-4000-8000-${(index + 1).toString(16).padStart(12, '0')}`],
  ['email', (index) => `user${String(index + 1)}@example.com`],
  ['date', (index) => new Date(Date.UTC(2024, 0, 1 + index)).toISOString()],
  ['name', (index) => SAMPLE_NAMES[index % SAMPLE_NAMES.length] ?? 'Sample Name'],
]);

export const PLACEHOLDER_KINDS = [...GENERATORS.keys()];

/**
 * Expand one template for item `index`.
 *
 * @throws ValidationError for an unknown placeholder
 */
export function expandTemplate(template: JsonValue, index: number, key = 'value'): JsonValue {
  if (typeof template === 'string') {
    const match = PLACEHOLDER.exec(template);
    if (!match) return template;
    const kind = match[1] ?? '';
    const generate = GENERATORS.get(kind);
    if (!generate) {
      throw new ValidationError(
        `unknown placeholder: ${template} (expected one of ${PLACEHOLDER_KINDS.join(', ')})`
      );
    }
    return generate(index, key);
  }

  if (Array.isArray(template)) {
    return template.map((item) => expandTemplate(item, index, key));
  }

  if (template !== null && typeof template === 'object') {
    // fromEntries defines own properties, so a "__proto__" key stays a plain key
    return Object.fromEntries(
      Object.entries(template).map(([childKey, value]): [string, JsonValue] => [
        childKey,
        expandTemplate(value, index, childKey),
      ])
    );
  }

  return template;
}

export function generateMock(type: MockType, template: JsonValue, options: MockOptions = {}): JsonValue {
  switch (type) {
    case 'object':
      return expandTemplate(template, 0);

    case 'list': {
      const count = options.count ?? 3;
      if (!Number.isInteger(count) || count < 0) {
        throw new ValidationError('count must be a non-negative integer');
      }
      return Array.from({ length: count }, (_, index) => expandTemplate(template, index));
    }

    case 'api_response': {
      const status = options.statusCode ?? 200;
      return {
        status,
        ok: status >= 200 && status < 300,
        data: expandTemplate(template, 0),
        meta: { mock: true },
      };
    }
  }
}
