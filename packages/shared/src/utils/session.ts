/** 32 symbols, without the look-alikes 0/O and 1/I */
export const SESSION_CODE_ALPHABET = 'ABCDEFGHJKLMNPQRSTUVWXYZ23456789';

const SESSION_CODE_PATTERN = /^[ABCDEFGHJKLMNPQRSTUVWXYZ23456789]{4}-[ABCDEFGHJKLMNPQRSTUVWXYZ23456789]{4}$/;

/**
 * Human-readable relay session code, format XXXX-XXXX.
 * `random` must return values in [0, 1).
 */
export function generateSessionCode(random: () => number = Math.random): string {
  let code = '';
  for (let i = 0; i < 9; i++) {
    if (i === 4) {
      code += '-';
      continue;
    }
    const index = Math.floor(random() * SESSION_CODE_ALPHABET.length);
    code += SESSION_CODE_ALPHABET[index];
  }
  return code;
}

export function isValidSessionCode(code: string): boolean {
  return SESSION_CODE_PATTERN.test(code);
}
