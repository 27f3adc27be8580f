/**
 * Decode a survey export to text. Qualtrics writes UTF-8 with a BOM for CSV
 * and UTF-16 for its tab-separated export; anything else goes through detection.
 */

import * as chardet from 'chardet'
import iconv from 'iconv-lite'

export interface DecodedText {
  text: string
  encoding: string
}

function bomEncoding(buf: Uint8Array): string | null {
  if (buf.length >= 3 && buf[0] === 0xef && buf[1] === 0xbb && buf[2] === 0xbf) return 'utf-8'
  if (buf.length >= 2 && buf[0] === 0xff && buf[1] === 0xfe) return 'utf-16le'
  if (buf.length >= 2 && buf[0] === 0xfe && buf[1] === 0xff) return 'utf-16be'
  return null
}

function isValidUtf8(buf: Uint8Array): boolean {
  try {
    new TextDecoder('utf-8', { fatal: true }).decode(buf)
    return true
  } catch {
    return false
  }
}

export function decodeExport(buf: Buffer): DecodedText {
  const fromBom = bomEncoding(buf)
  // iconv strips the BOM while decoding
  if (fromBom) return { text: iconv.decode(buf, fromBom), encoding: fromBom }
  if (isValidUtf8(buf)) return { text: buf.toString('utf-8'), encoding: 'utf-8' }

  const detected = chardet.detect(buf)
  if (detected && iconv.encodingExists(detected)) {
    return { text: iconv.decode(buf, detected), encoding: detected.toLowerCase() }
  }
  return { text: iconv.decode(buf, 'latin1'), encoding: 'latin1' }
}

/** Strip a leading BOM left over in text that was decoded elsewhere */
export function stripBom(text: string): string {
  return text.replace(/^\uFEFF/, '')
}
