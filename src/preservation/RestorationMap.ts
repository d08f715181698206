import { errorMessage, RestorationError } from '../util/errors';
import { SchemaAssert } from '../util/SchemaAssert';
import { isPlaceholder } from './Placeholder';

/**
 * Placeholder token → the original text it stands for.
 */
export type RestorationMap = Record<string, string>;

const assert = new SchemaAssert((message): Error => new RestorationError('shape', message));

export function serializeRestorationMap(map: RestorationMap): string {
  return JSON.stringify(map);
}

export function parseRestorationMap(json: string): RestorationMap {
  let value: unknown;
  try {
    value = JSON.parse(json);
  } catch (error: unknown) {
    throw new RestorationError('shape', `restoration map is not valid JSON: ${errorMessage(error)}`);
  }

  const map = assert.stringRecord(value, 'restorationMap');
  for (const key of Object.keys(map)) {
    if (!isPlaceholder(key)) {
      throw RestorationError.invalidKey(key);
    }
  }
  return map;
}
