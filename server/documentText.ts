import fs from 'fs';

const utf8 = new TextDecoder('utf-8', { fatal: true });

/**
 * Decode a pairing document as UTF-8, falling back to Latin-1 for
 * exports from older crew-scheduling systems
 */
export function decodeDocument(buffer: Buffer | Uint8Array): string {
  try {
    return utf8.decode(buffer);
  } catch (error) {
    if (!(error instanceof TypeError)) throw error;
    return Buffer.from(buffer).toString('latin1');
  }
}

export async function readDocumentFile(filePath: string): Promise<string> {
  const buffer = await fs.promises.readFile(filePath);
  return decodeDocument(buffer);
}
