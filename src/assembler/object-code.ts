/**
 * Object Code
 *
 * Text form of an assembled program: one word per line, in address order.
 */

export class ObjectCodeError extends Error {
  constructor(message: string, public line: number) {
    super(`${message} at line ${line}`);
    this.name = 'ObjectCodeError';
  }
}

export function formatObjectCode(words: readonly number[]): string {
  return words.map((word) => `0x${(word >>> 0).toString(16).padStart(8, '0')}`).join('\n');
}

/**
 * Parse object code. Words may be decimal or 0x-prefixed hex; blank lines
 * and `#` comments are skipped.
 */
export function parseObjectCode(text: string): number[] {
  const words: number[] = [];

  text.split(/\r?\n/).forEach((raw, index) => {
    const line = raw.replace(/#.*$/, '').trim();
    if (line === '') return;

    let value: number;
    if (/^0x[0-9a-fA-F]+$/.test(line)) {
      value = parseInt(line.slice(2), 16);
    } else if (/^-?[0-9]+$/.test(line)) {
      value = parseInt(line, 10);
    } else {
      throw new ObjectCodeError(`Invalid word '${line}'`, index + 1);
    }

    if (value < -0x80000000 || value > 0xffffffff) {
      throw new ObjectCodeError(`Word ${line} out of range`, index + 1);
    }
    words.push(value >>> 0);
  });

  return words;
}
