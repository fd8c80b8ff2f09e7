/**
 * GpgKeyReader - parses `--with-colons` key listings into GpgKey records
 */

import type { Readable } from 'stream';
import { createInterface } from 'readline';
import { GpgKeyCapabilities } from './types.js';
import type { GpgAlgorithm, GpgKey, GpgRecordType, GpgValidity } from './types.js';

const RECORD_TYPES = new Map<string, GpgRecordType>([
  ['pub', 'public-key'],
  ['crt', 'x509-certificate'],
  ['crs', 'x509-certificate-private-key'],
  ['sub', 'public-subkey'],
  ['sec', 'secret-key'],
  ['ssb', 'secret-subkey'],
  ['uid', 'user-id'],
  ['uat', 'user-attribute'],
  ['sig', 'signature'],
  ['rev', 'revocation-certificate'],
  ['fpr', 'fingerprint'],
  ['pkd', 'public-key-data'],
  ['grp', 'keygrip'],
  ['rvk', 'revocation-key'],
  ['tru', 'trust-record'],
  ['spk', 'signature-subpacket'],
]);

const VALIDITIES = new Map<string, GpgValidity>([
  ['o', 'new'],
  ['i', 'invalid'],
  ['d', 'disabled'],
  ['r', 'revoked'],
  ['e', 'expired'],
  ['n', 'valid'],
  ['m', 'marginal'],
  ['f', 'full'],
  ['u', 'ultimate'],
]);

const ALGORITHMS = new Map<number, GpgAlgorithm>([
  [1, 'rsa'],
  [16, 'elgamal'],
  [17, 'dsa'],
  [20, 'elgamal-sign-encrypt'],
]);

const CAPABILITY_LETTERS: ReadonlyArray<[string, GpgKeyCapabilities]> = [
  ['e', GpgKeyCapabilities.Encryption],
  ['s', GpgKeyCapabilities.Signing],
  ['c', GpgKeyCapabilities.Certification],
  ['a', GpgKeyCapabilities.Authentication],
  ['D', GpgKeyCapabilities.Disabled],
];

export class GpgKeyReader {
  /**
   * Parse every non-blank line of a listing
   */
  static parse(listing: string): GpgKey[] {
    return listing
      .split(/\r?\n/)
      .filter((line) => line.trim().length > 0)
      .map((line) => GpgKeyReader.parseLine(line));
  }

  /**
   * Parse a listing from a stream, line by line, until it ends
   */
  static async read(source: Readable): Promise<GpgKey[]> {
    const keys: GpgKey[] = [];
    const lines = createInterface({ input: source, crlfDelay: Infinity });
    for await (const line of lines) {
      if (line.trim().length > 0) {
        keys.push(GpgKeyReader.parseLine(line));
      }
    }
    return keys;
  }

  static parseLine(line: string): GpgKey {
    const fields = line.split(':');
    const field = (index: number): string | null => fields[index] ?? null;

    return {
      recordType: RECORD_TYPES.get(field(0) ?? '') ?? 'unknown',
      validity: VALIDITIES.get(field(1) ?? '') ?? 'unknown',
      keyLength: parseInteger(field(2)),
      algorithm: ALGORITHMS.get(parseInteger(field(3))) ?? 'unknown',
      keyId: field(4),
      creationDate: parseDate(field(5)),
      expirationDate: parseDate(field(6)),
      hash: field(7),
      ownerTrust: field(8),
      userId: field(9),
      signatureClass: field(10),
      capabilities: parseCapabilities(field(11)),
      fingerprint: field(12),
      flag: field(13),
      serialNumber: field(14),
    };
  }
}

function parseInteger(value: string | null): number {
  if (value === null || !/^[+-]?\d+$/.test(value.trim())) {
    return 0;
  }
  return Number.parseInt(value, 10);
}

// gpg writes ISO timestamps without separators, always in UTC
const COMPACT_ISO_DATE = /^(\d{4})(\d{2})(\d{2})T(\d{2})(\d{2})(\d{2})$/;

/**
 * ISO 8601 when the value contains 'T', seconds since the epoch otherwise
 */
function parseDate(value: string | null): Date | null {
  if (value === null || value.trim() === '') {
    return null;
  }
  if (value.includes('T')) {
    const compact = COMPACT_ISO_DATE.exec(value.trim());
    const date = compact
      ? new Date(
          Date.UTC(
            Number(compact[1]),
            Number(compact[2]) - 1,
            Number(compact[3]),
            Number(compact[4]),
            Number(compact[5]),
            Number(compact[6])
          )
        )
      : new Date(value);
    return Number.isNaN(date.getTime()) ? null : date;
  }
  if (!/^\d+$/.test(value.trim())) {
    return null;
  }
  return new Date(Number.parseInt(value, 10) * 1000);
}

function parseCapabilities(value: string | null): GpgKeyCapabilities {
  let capabilities: GpgKeyCapabilities = GpgKeyCapabilities.None;
  if (value === null) {
    return capabilities;
  }
  for (const [letter, flag] of CAPABILITY_LETTERS) {
    if (value.includes(letter)) {
      capabilities |= flag;
    }
  }
  return capabilities;
}
