import { readFileSync } from 'node:fs';

/** HTML 4 entity names and the code points they stand for. */
function loadNamedEntities(): ReadonlyMap<string, number> {
  const raw: unknown = JSON.parse(
    readFileSync(new URL('./html-entities.json', import.meta.url), 'utf8'),
  );
  if (typeof raw !== 'object' || raw === null) {
    throw new TypeError('html-entities.json must hold an object');
  }

  const entities = new Map<string, number>();
  for (const [name, codePoint] of Object.entries(raw)) {
    if (typeof codePoint === 'number') entities.set(name, codePoint);
  }
  return entities;
}

const NAMED_ENTITIES = loadNamedEntities();

const ENTITY = /&#?\w+;/g;
const MAX_CODE_POINT = 0x10ffff;

function decodeReference(entity: string): string {
  const hex = entity.startsWith('&#x');
  const digits = entity.slice(hex ? 3 : 2, -1);
  if (!(hex ? /^[0-9a-fA-F]+$/ : /^[0-9]+$/).test(digits)) return entity;

  const codePoint = Number.parseInt(digits, hex ? 16 : 10);
  return codePoint <= MAX_CODE_POINT ? String.fromCodePoint(codePoint) : entity;
}

/**
 * Decode HTML character references (`&#39;`, `&#x27;`) and named entities
 * (`&amp;`, `&apos;`). Anything unrecognised is left as written.
 */
export function unescape(text: string): string {
  return text.replace(ENTITY, (entity) => {
    if (entity.startsWith('&#')) return decodeReference(entity);

    const name = entity.slice(1, -1);
    const codePoint = NAMED_ENTITIES.get(name);
    if (codePoint !== undefined) return String.fromCodePoint(codePoint);
    return name === 'apos' ? "'" : entity;
  });
}
