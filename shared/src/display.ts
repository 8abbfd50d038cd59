/**
 * Display projections of macros for list rows and status lines
 */

import { InputEvent } from './input-event';
import { keyDescription, mouseButtonDescription, MODIFIER_BITS } from './key-labels';
import { MacroStep } from './macro';

/**
 * Modifier symbols for a mask, in ⇧⌃⌥⌘ order
 */
export function modifierSymbols(mask: number): string {
  let symbols = '';
  if (mask & MODIFIER_BITS.SHIFT) symbols += '⇧';
  if (mask & MODIFIER_BITS.CONTROL) symbols += '⌃';
  if (mask & MODIFIER_BITS.OPTION) symbols += '⌥';
  if (mask & MODIFIER_BITS.COMMAND) symbols += '⌘';
  return symbols;
}

/**
 * Binding badge text
 */
export function formatBinding(binding: InputEvent | null): string {
  if (!binding) {
    return 'Click to bind';
  }
  return `${modifierSymbols(binding.modifierMask)}${binding.label}`;
}

/**
 * Key sequence summary: labels of the down events only
 */
export function formatKeySequence(keySequence: readonly InputEvent[]): string {
  const downs = keySequence.filter(event => event.phase);
  if (downs.length === 0) {
    return 'No keys recorded';
  }
  return downs.map(event => event.label).join(', ');
}

function describeStep(step: MacroStep): string {
  switch (step.type) {
    case 'key': {
      const name = keyDescription(step.keyCode ?? -1);
      return `${modifierSymbols(step.modifiers)}${name.length === 1 ? name.toUpperCase() : name}`;
    }
    case 'mouse':
      return `${modifierSymbols(step.modifiers)}${mouseButtonDescription(step.keyCode ?? 0)}`;
    case 'text':
      return `"${step.text ?? ''}"`;
    case 'delay':
      return `wait ${step.delay ?? 0}s`;
  }
}

/**
 * Alternate display string built from the legacy steps list
 */
export function describeSteps(steps: readonly MacroStep[]): string {
  if (steps.length === 0) {
    return 'No steps';
  }
  return steps.map(describeStep).join(' → ');
}
