import { X509Certificate, createPublicKey, KeyObject } from 'crypto';
import { PublicKeyCheck } from '../types';
import { errorMessage } from './errors';

const PEM_LABEL = /^-----BEGIN ([A-Z0-9 ]+)-----/;

export function isPrivateKeyLabel(label: string | undefined): boolean {
  return label !== undefined && label.endsWith('PRIVATE KEY');
}

/**
 * Parse the `publicKey` of a record as a PEM encoded SubjectPublicKeyInfo
 * (`PUBLIC KEY`) or X.509 certificate (`CERTIFICATE`). Any other block is
 * refused, private keys included. The schema only requires a string; this
 * is the application-layer check.
 */
export function checkPublicKey(pem: string): PublicKeyCheck {
  const text = pem.trim();
  if (!text) {
    return { ok: false, error: 'Public key is empty' };
  }

  const label = PEM_LABEL.exec(text)?.[1];
  if (label === undefined) {
    return { ok: false, error: 'Public key is not a PEM block' };
  }
  if (isPrivateKeyLabel(label)) {
    return {
      ok: false,
      label,
      error: `Expected a public key or certificate, found a ${label} block`,
    };
  }
  if (label !== 'PUBLIC KEY' && label !== 'CERTIFICATE') {
    return {
      ok: false,
      label,
      error: `Unsupported PEM block ${label}; expected PUBLIC KEY or CERTIFICATE`,
    };
  }

  try {
    if (label === 'CERTIFICATE') {
      const certificate = new X509Certificate(text);
      return describeKey(certificate.publicKey, 'certificate');
    }
    return describeKey(createPublicKey({ key: text, format: 'pem' }), 'spki');
  } catch (e) {
    return { ok: false, error: errorMessage(e) };
  }
}

function describeKey(key: KeyObject, encoding: 'spki' | 'certificate'): PublicKeyCheck {
  return { ok: true, keyType: key.asymmetricKeyType, encoding };
}
