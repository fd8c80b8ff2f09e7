/**
 * Records produced by `gpg --with-colons` key listings
 */

export type GpgRecordType =
  | 'public-key'
  | 'x509-certificate'
  | 'x509-certificate-private-key'
  | 'public-subkey'
  | 'secret-key'
  | 'secret-subkey'
  | 'user-id'
  | 'user-attribute'
  | 'signature'
  | 'revocation-certificate'
  | 'fingerprint'
  | 'public-key-data'
  | 'keygrip'
  | 'revocation-key'
  | 'trust-record'
  | 'signature-subpacket'
  | 'unknown';

export type GpgValidity =
  | 'new'
  | 'invalid'
  | 'disabled'
  | 'revoked'
  | 'expired'
  | 'valid'
  | 'marginal'
  | 'full'
  | 'ultimate'
  | 'unknown';

export type GpgAlgorithm = 'rsa' | 'elgamal' | 'dsa' | 'elgamal-sign-encrypt' | 'unknown';

/**
 * Bit flags; combine with `|` and test with `&`
 */
export enum GpgKeyCapabilities {
  None = 0,
  Encryption = 1 << 0,
  Signing = 1 << 1,
  Certification = 1 << 2,
  Authentication = 1 << 3,
  Disabled = 1 << 4,
}

export interface GpgKey {
  recordType: GpgRecordType;
  validity: GpgValidity;
  /** Key length in bits, 0 when absent */
  keyLength: number;
  algorithm: GpgAlgorithm;
  keyId: string | null;
  creationDate: Date | null;
  expirationDate: Date | null;
  /**
   * Serial number for crt records; hash of the user ID for uid/uat records;
   * trust depth and value for trust signatures
   */
  hash: string | null;
  ownerTrust: string | null;
  userId: string | null;
  /** Two hex digits followed by 'x' (exportable) or 'l' (local) */
  signatureClass: string | null;
  capabilities: GpgKeyCapabilities;
  fingerprint: string | null;
  flag: string | null;
  /** Token serial number for sec/ssb, or '#' for a stub key */
  serialNumber: string | null;
}
