const FNV_OFFSET_BASIS = 14695981039346656037n
const FNV_PRIME = 1099511628211n
const MASK_64 = 0xffffffffffffffffn
const MASK_32 = 0xffffffffn

const encoder = new TextEncoder()

/**
 * 64-bit FNV-1a over the UTF-8 bytes of `text`, XOR-folded to 32 bits.
 * Stable across processes and platforms, so clients can precompute it.
 *
 * @example
 * ```typescript
 * fnv1a32('hp.*') // 2250989517
 * ```
 */
export function fnv1a32(text: string): number {
  let hash = FNV_OFFSET_BASIS
  for (const byte of encoder.encode(text)) {
    hash ^= BigInt(byte)
    hash = (hash * FNV_PRIME) & MASK_64
  }
  return Number((hash ^ (hash >> 32n)) & MASK_32)
}
