/**
 * Key Events
 *
 * Host-independent key representation, plus the adapter from Ink's
 * useInput callback arguments.
 */

import type { Key } from "ink";

export type NamedKey = "up" | "down" | "left" | "right" | "pageUp" | "pageDown" | "enter" | "escape" | "tab" | "backspace" | "delete";

/** A named key, or a printable character */
export type KeyCode = NamedKey | { char: string };

export interface KeyModifiers {
  ctrl: boolean;
  alt: boolean;
  shift: boolean;
}

export interface KeyEvent {
  code: KeyCode;
  modifiers: KeyModifiers;
}

export const NO_MODIFIERS: KeyModifiers = Object.freeze({ ctrl: false, alt: false, shift: false });

/**
 * Build a key event. Modifiers default to none.
 */
export function keyEvent(code: KeyCode, modifiers: Partial<KeyModifiers> = {}): KeyEvent {
  return { code, modifiers: { ...NO_MODIFIERS, ...modifiers } };
}

/** Ctrl+<char> */
export function ctrlKey(char: string): KeyEvent {
  return keyEvent({ char }, { ctrl: true });
}

/**
 * True when the event carries no modifier at all.
 */
export function hasNoModifiers(event: KeyEvent): boolean {
  return !event.modifiers.ctrl && !event.modifiers.alt && !event.modifiers.shift;
}

/**
 * True when the event is Ctrl plus the given character and nothing else.
 */
export function isCtrlChar(event: KeyEvent, char: string): boolean {
  return typeof event.code === "object" && event.code.char === char && event.modifiers.ctrl && !event.modifiers.alt && !event.modifiers.shift;
}

/**
 * True when the event is the given named key without modifiers.
 */
export function isPlainKey(event: KeyEvent, name: NamedKey): boolean {
  return event.code === name && hasNoModifiers(event);
}

function namedKeyFromInk(key: Key): NamedKey | null {
  if (key.upArrow) return "up";
  if (key.downArrow) return "down";
  if (key.leftArrow) return "left";
  if (key.rightArrow) return "right";
  if (key.pageUp) return "pageUp";
  if (key.pageDown) return "pageDown";
  if (key.return) return "enter";
  if (key.escape) return "escape";
  if (key.tab) return "tab";
  if (key.backspace) return "backspace";
  if (key.delete) return "delete";
  return null;
}

/**
 * Convert the arguments of Ink's useInput handler into a KeyEvent.
 */
export function fromInkInput(input: string, key: Key): KeyEvent {
  const modifiers: KeyModifiers = { ctrl: key.ctrl, alt: key.meta, shift: key.shift };
  const named = namedKeyFromInk(key);
  if (named !== null) {
    return { code: named, modifiers };
  }
  return { code: { char: input }, modifiers };
}
