import type { Cleaner, CleanerInput } from '../cleaner';

/**
 * Normalises the whitespace of a clause span so the text handed to the
 * embedding and generation services is stable. Never adds characters, so a
 * cleaned clause is never longer than its span.
 */
export class ClauseTextCleaner implements Cleaner {
  clean(input: CleanerInput): string {
    let t = input.rawText ?? '';

    t = t.replace(/\r\n?/g, '\n');
    t = t.replace(/[\u200B-\u200D\uFEFF]/g, ''); // zero-width
    t = t.replace(/\u00A0/g, ' '); // NBSP
    t = t.replace(/[ \t]+/g, ' ');
    t = t.replace(/ *\n */g, '\n');
    t = t.replace(/\n{3,}/g, '\n\n');

    return t.trim();
  }
}
