/**
 * clipboard/selector.ts
 *
 * Picks the one target worth requesting: any image beats any text.
 */

import { ClipboardTarget } from '../core/types';

export const TEXT_TARGETS: readonly ClipboardTarget[] = ['text/plain', 'UTF8_STRING'];

export function isImageTarget(target: ClipboardTarget): boolean {
  return target.startsWith('image/');
}

export function isTextTarget(target: ClipboardTarget): boolean {
  return TEXT_TARGETS.includes(target);
}

/**
 * First image target in enumeration order, else the first text target, else null.
 * Enumeration order is whatever the clipboard owner reports; no quality ranking.
 */
export function selectTarget(targets: readonly ClipboardTarget[]): ClipboardTarget | null {
  return targets.find(isImageTarget) ?? targets.find(isTextTarget) ?? null;
}

/** One target per line, as wl-paste and xclip print them. */
export function parseTargetList(stdout: Buffer): ClipboardTarget[] {
  return stdout
    .toString('utf-8')
    .split(/\r?\n/)
    .map(line => line.trim())
    .filter(line => line.length > 0);
}
