import { describe, expect, it } from 'vitest';
import { ed25519 } from '@noble/curves/ed25519';
import { utf8ToBytes } from '@noble/hashes/utils';
import { derivePrivateKey, derivePublicKey, expandSeed, signWithExpandedKey } from './ed25519';

const seed = new Uint8Array(32).fill(3);
const chainCode = new Uint8Array(32);
const root = expandSeed(seed, chainCode);

describe('ed25519 derivation', () => {
  it('expands a seed to the standard Ed25519 public key', () => {
    expect(root.publicKey).toEqual(ed25519.getPublicKey(seed));
    expect(root.chainCode).toEqual(chainCode);
  });

  it('signs with the root key exactly like plain Ed25519', () => {
    const message = utf8ToBytes('hello');

    expect(signWithExpandedKey(root, message)).toEqual(ed25519.sign(message, seed));
  });

  it('returns the root key for an empty path', () => {
    expect(derivePrivateKey(root, [])).toBe(root);
    expect(derivePublicKey(root.publicKey, chainCode, [])).toEqual({
      publicKey: root.publicKey,
      chainCode,
    });
  });

  it('derives matching private and public halves', () => {
    const path = [utf8ToBytes('app'), Uint8Array.of(1, 2, 3)];

    const priv = derivePrivateKey(root, path);
    const pub = derivePublicKey(root.publicKey, chainCode, path);

    expect(priv.publicKey).toEqual(pub.publicKey);
    expect(priv.chainCode).toEqual(pub.chainCode);
    expect(ed25519.ExtendedPoint.BASE.multiply(priv.scalar).toRawBytes()).toEqual(pub.publicKey);
    expect(pub.publicKey).not.toEqual(root.publicKey);
  });

  it('produces signatures that verify under the derived public key', () => {
    const path = [utf8ToBytes('wallet'), utf8ToBytes('0')];
    const message = utf8ToBytes('transfer 10');

    const signature = signWithExpandedKey(derivePrivateKey(root, path), message);
    const { publicKey } = derivePublicKey(root.publicKey, chainCode, path);

    expect(signature).toHaveLength(64);
    expect(ed25519.verify(signature, message, publicKey)).toBe(true);
    expect(ed25519.verify(signature, utf8ToBytes('transfer 11'), publicKey)).toBe(false);
  });

  it('derives the same child in one step or two', () => {
    const a = utf8ToBytes('a');
    const b = utf8ToBytes('b');

    const parent = derivePublicKey(root.publicKey, chainCode, [a]);

    expect(derivePublicKey(parent.publicKey, parent.chainCode, [b])).toEqual(
      derivePublicKey(root.publicKey, chainCode, [a, b])
    );
  });

  it('is order sensitive', () => {
    const a = utf8ToBytes('a');
    const b = utf8ToBytes('b');

    expect(derivePublicKey(root.publicKey, chainCode, [a, b]).publicKey).not.toEqual(
      derivePublicKey(root.publicKey, chainCode, [b, a]).publicKey
    );
  });
});
