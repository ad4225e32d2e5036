import { randomInt } from 'crypto';
import { AUTH_CONSTANTS } from '../constants/auth.constants';

/** Uniformly random code drawn from letters and digits. */
export const createRandomCode = (
  length: number,
  alphabet: string = AUTH_CONSTANTS.VERIFY_CODE_ALPHABET,
): string => {
  let code = '';
  for (let i = 0; i < length; i++) {
    code += alphabet[randomInt(alphabet.length)];
  }
  return code;
};
