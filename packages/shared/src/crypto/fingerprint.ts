import { sha256 } from "@noble/hashes/sha256";
import { bytesToHex, utf8ToBytes } from "@noble/hashes/utils";
import { canonicalize } from "json-canonicalize";

export function sha256Hex(input: string): string {
  return bytesToHex(sha256(utf8ToBytes(input)));
}

/**
 * SHA-256 over the RFC 8785 canonical form, so values that differ only in
 * member order share a fingerprint.
 */
export function fingerprint(value: unknown): string {
  return sha256Hex(canonicalize(value));
}
