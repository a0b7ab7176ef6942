/**
 * ID codecs
 *
 * Principal identifiers travel as strings (JWT `sub`, API-key owner column,
 * URL parameters) and are parsed back into the host application's ID type by
 * a codec injected into the providers.
 */

import { z } from 'zod';
import { InvalidIdentifierError } from '../utils/errors.js';

export interface IdCodec<ID extends number | string> {
  /** Human-readable name used in error messages */
  readonly kind: string;
  parse(raw: string | number): ID;
  format(id: ID): string;
}

const DIGITS = /^-?\d+$/;

export const intIdCodec: IdCodec<number> = {
  kind: 'integer',

  parse(raw) {
    if (typeof raw === 'number') {
      if (Number.isSafeInteger(raw)) {
        return raw;
      }
      throw new InvalidIdentifierError(this.kind);
    }

    const trimmed = raw.trim();
    if (!DIGITS.test(trimmed)) {
      throw new InvalidIdentifierError(this.kind);
    }

    const value = Number(trimmed);
    if (!Number.isSafeInteger(value)) {
      throw new InvalidIdentifierError(this.kind);
    }
    return value;
  },

  format(id) {
    return String(id);
  },
};

const uuidSchema = z.string().trim().uuid();

export const uuidIdCodec: IdCodec<string> = {
  kind: 'UUID',

  parse(raw) {
    const result = uuidSchema.safeParse(raw);
    if (!result.success) {
      throw new InvalidIdentifierError(this.kind);
    }
    return result.data.toLowerCase();
  },

  format(id) {
    return id.toLowerCase();
  },
};
