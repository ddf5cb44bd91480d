import { EncodingError } from "../errors/index.js";

/**
 * Tiny run-time test - are we really in Node
 */
function isNodeLike(): boolean {
  return (
    typeof process !== 'undefined' &&
    typeof process.versions === 'object' &&
    typeof Buffer !== 'undefined'
  );
}

/* ------------------------------------------------------------------ */

export function concat(...chunks: Uint8Array[]): Uint8Array {
  const total = chunks.reduce((n, c) => n + c.byteLength, 0);
  const out   = new Uint8Array(total);
  let offset  = 0;
  for (const c of chunks) {
    out.set(c, offset);
    offset += c.byteLength;
  }
  return out;
}

/* ----------  Base64 encode  --------------------------------------- */
export function base64Encode(...chunks: Uint8Array[]): string {
  try {
    const data = concat(...chunks);

    if (isNodeLike()) {
      return Buffer.from(data.buffer, data.byteOffset, data.byteLength).toString('base64');
    }

    let binary = '';
    for (let i = 0; i < data.length; i++) binary += String.fromCharCode(data[i]);
    return btoa(binary);
  } catch (err) {
    const msg = err instanceof Error ? err.message : String(err);
    throw new EncodingError(`Base64 Encoding Error: ${msg}`);
  }
}

/* ----------  Hex encode  ------------------------------------------ */
export function hexEncode(u8: Uint8Array): string {
  let s = '';
  for (let i = 0; i < u8.length; i++) {
    s += u8[i].toString(16).padStart(2, '0');
  }
  return s;
}
