/**
 * Byte-signature sniffing and XML declaration reading.
 */

/**
 * What the leading bytes of a document say about its encoding.
 */
export interface SniffedEncoding {
  /** Encoding name as understood by iconv-lite, or "cp037" for EBCDIC */
  encoding: string;
  /** Length of the byte order mark to skip, 0 when the signature is "<" or "<?" */
  bomLength: number;
}

function startsWith(bytes: Uint8Array, signature: readonly number[]): boolean {
  if (bytes.length < signature.length) {
    return false;
  }
  return signature.every((byte, index) => bytes[index] === byte);
}

/**
 * Detects the encoding from a byte order mark or from the byte pattern of
 * a leading "<" or "<?". Returns undefined for ASCII-compatible input with
 * no BOM.
 */
export function sniffEncoding(bytes: Uint8Array): SniffedEncoding | undefined {
  // "<?xm" in EBCDIC
  if (startsWith(bytes, [0x4c, 0x6f, 0xa7, 0x94])) {
    return { encoding: "cp037", bomLength: 0 };
  }

  if (startsWith(bytes, [0x00, 0x00, 0xfe, 0xff])) {
    return { encoding: "utf-32be", bomLength: 4 };
  }
  if (startsWith(bytes, [0xff, 0xfe, 0x00, 0x00])) {
    return { encoding: "utf-32le", bomLength: 4 };
  }
  if (startsWith(bytes, [0x00, 0x00, 0x00, 0x3c])) {
    return { encoding: "utf-32be", bomLength: 0 };
  }
  if (startsWith(bytes, [0x3c, 0x00, 0x00, 0x00])) {
    return { encoding: "utf-32le", bomLength: 0 };
  }

  if (startsWith(bytes, [0xfe, 0xff])) {
    return { encoding: "utf-16be", bomLength: 2 };
  }
  if (startsWith(bytes, [0xff, 0xfe])) {
    return { encoding: "utf-16le", bomLength: 2 };
  }
  if (startsWith(bytes, [0x00, 0x3c, 0x00, 0x3f])) {
    return { encoding: "utf-16be", bomLength: 0 };
  }
  if (startsWith(bytes, [0x3c, 0x00, 0x3f, 0x00])) {
    return { encoding: "utf-16le", bomLength: 0 };
  }

  if (startsWith(bytes, [0xef, 0xbb, 0xbf])) {
    return { encoding: "utf-8", bomLength: 3 };
  }

  return undefined;
}

const XML_DECLARATION_PATTERN =
  /^\s*<\?xml\b[^>]*?\bencoding\s*=\s*["']([A-Za-z][A-Za-z0-9._:-]*)["'][^>]*\?>/;

/**
 * Reads the encoding pseudo-attribute from an XML declaration at the start
 * of already-decoded text.
 */
export function readXmlDeclarationEncoding(text: string): string | undefined {
  return XML_DECLARATION_PATTERN.exec(text)?.[1];
}

/**
 * Reads the XML declaration's encoding from ASCII-compatible bytes.
 */
export function readXmlDeclarationEncodingFromBytes(bytes: Uint8Array): string | undefined {
  const head = Buffer.from(bytes.subarray(0, 1024)).toString("latin1");
  return readXmlDeclarationEncoding(head);
}
