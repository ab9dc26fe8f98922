/**
 * Signature recovery.
 *
 * Recovers the signer of a raw 32-byte digest from a 65-byte r || s || v
 * signature. The digest is used as-is: no message prefix is applied.
 *
 * Malformed input never throws; it recovers to the zero address, which
 * callers must treat as "no valid signer".
 */

import { concat, hexToNumber, isHex, numberToHex, recoverAddress, slice, zeroAddress } from "viem";
import { isBytes32 } from "@tradevault/types";
import type { Address, Hex } from "@tradevault/types";

const SIGNATURE_SIZE = 65;

export async function recoverSigner(digest: Hex, signature: Hex): Promise<Address> {
  if (!isBytes32(digest)) return zeroAddress;
  if (!isHex(signature, { strict: true }) || signature.length !== 2 + SIGNATURE_SIZE * 2) return zeroAddress;

  const r = slice(signature, 0, 32);
  const s = slice(signature, 32, 64);
  let v = hexToNumber(slice(signature, 64, 65));
  if (v < 27) v += 27;
  if (v !== 27 && v !== 28) return zeroAddress;

  try {
    return await recoverAddress({
      hash: digest,
      signature: concat([r, s, numberToHex(v, { size: 1 })]),
    });
  } catch {
    return zeroAddress;
  }
}
