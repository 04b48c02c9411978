import type { MetadataLookup } from '../types/scheduler';
import { isObject } from '../types/utils';
import type { Operator } from '../operator/operator';
import { toError } from '../utils/operator-error';

/**
 * Documentation of an operator: its own description followed by the
 * description of its constructor, joined by a newline. Undefined when both are empty.
 */
export function lookupDocumentation(operator: Operator): MetadataLookup<string | undefined> {
  try {
    const own = operator.description ?? '';
    const classText: unknown = Reflect.get(operator.constructor, 'description');
    const classDoc = typeof classText === 'string' ? classText : '';

    const parts = [own, classDoc].filter(part => part.length > 0);
    return { ok: true, value: parts.length > 0 ? parts.join('\n') : undefined };
  } catch (error) {
    return { ok: false, error: toError(error) };
  }
}

/**
 * Communication metadata declared by the operator's `comms()`; `{}` when it declares none
 */
export function lookupComms(operator: Operator): MetadataLookup<Readonly<Record<string, unknown>>> {
  try {
    const comms = operator.comms?.() ?? {};
    if (!isObject(comms)) {
      return { ok: false, error: new Error('comms() must return a plain object') };
    }
    return { ok: true, value: comms };
  } catch (error) {
    return { ok: false, error: toError(error) };
  }
}
