/**
 * Trigger Matcher
 *
 * Finds the macro bound to a live down event. Candidates are scanned in the
 * order the macro cache holds them and the first hit wins. When several
 * macros bind the same key with overlapping modifier rules, which one fires
 * depends on that order and is not otherwise defined.
 */

import { InputEvent } from './input-event';
import { Macro } from './macro';

/**
 * Whether a binding accepts an event. A zero binding mask is a wildcard;
 * any other mask must match exactly. The binding's phase is ignored.
 */
export function bindingMatches(binding: InputEvent, event: InputEvent): boolean {
  if (binding.channel !== event.channel || binding.code !== event.code) {
    return false;
  }
  return binding.modifierMask === 0 || binding.modifierMask === event.modifierMask;
}

/**
 * Return the first candidate whose binding matches, or null
 */
export function matchTrigger(event: InputEvent, candidates: readonly Macro[]): Macro | null {
  for (const macro of candidates) {
    if (macro.binding && bindingMatches(macro.binding, event)) {
      return macro;
    }
  }
  return null;
}

/**
 * Two macros whose bindings can fire on the same event
 */
export interface BindingConflict {
  first: Macro;
  second: Macro;
}

/**
 * Report macros with overlapping bindings. Matching itself is unaffected.
 */
export function findBindingConflicts(candidates: readonly Macro[]): BindingConflict[] {
  const conflicts: BindingConflict[] = [];
  const bound = candidates.filter(macro => macro.binding !== null);

  for (let i = 0; i < bound.length; i++) {
    for (let j = i + 1; j < bound.length; j++) {
      const a = bound[i].binding;
      const b = bound[j].binding;
      if (!a || !b) continue;
      const sameKey = a.channel === b.channel && a.code === b.code;
      const overlapping = a.modifierMask === 0 || b.modifierMask === 0 || a.modifierMask === b.modifierMask;
      if (sameKey && overlapping) {
        conflicts.push({ first: bound[i], second: bound[j] });
      }
    }
  }
  return conflicts;
}
