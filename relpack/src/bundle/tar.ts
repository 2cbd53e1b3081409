/**
 * POSIX ustar pack/extract for regular files. Bundles only ever hold a handful
 * of flat files, so no library is pulled in for this.
 */

const BLOCK = 512;
const NAME_LEN = 100;
const PREFIX_LEN = 155;

export type TarEntry = {
  name: string;
  data: Buffer;
  /** Defaults to 0o644. */
  mode?: number;
};

function padOctal(n: number, len: number): string {
  return n.toString(8).padStart(len - 1, "0") + "\0";
}

function headerChecksum(header: Buffer): number {
  let sum = 0;
  for (let i = 0; i < BLOCK; i++) {
    // checksum field (148-155) counts as spaces
    sum += i >= 148 && i < 156 ? 32 : header[i];
  }
  return sum;
}

/** Split a path into ustar (prefix, name) so names up to 255 bytes fit. */
function splitName(name: string): { prefix: string; base: string } {
  if (Buffer.byteLength(name) <= NAME_LEN) return { prefix: "", base: name };
  const cut = name.lastIndexOf("/", PREFIX_LEN);
  const prefix = cut > 0 ? name.slice(0, cut) : "";
  const base = cut > 0 ? name.slice(cut + 1) : name;
  if (Buffer.byteLength(prefix) > PREFIX_LEN || Buffer.byteLength(base) > NAME_LEN) {
    throw new Error(`Path too long for ustar archive: ${name}`);
  }
  return { prefix, base };
}

function readString(buf: Buffer, start: number, len: number): string {
  return buf.subarray(start, start + len).toString("utf8").replace(/\0.*$/s, "");
}

/**
 * Pack entries into an uncompressed tar buffer. `mtime` is written into every
 * header, so equal inputs give byte-identical archives.
 */
export function pack(entries: TarEntry[], mtime = 0): Buffer {
  const blocks: Buffer[] = [];

  for (const entry of entries) {
    const header = Buffer.alloc(BLOCK, 0);
    const { prefix, base } = splitName(entry.name);

    header.write(base, 0, NAME_LEN, "utf8");
    header.write(padOctal(entry.mode ?? 0o644, 8), 100, 8, "utf8");
    header.write(padOctal(0, 8), 108, 8, "utf8");
    header.write(padOctal(0, 8), 116, 8, "utf8");
    header.write(padOctal(entry.data.length, 12), 124, 12, "utf8");
    header.write(padOctal(mtime, 12), 136, 12, "utf8");
    // typeflag '0' = regular file
    header.write("0", 156, 1, "utf8");
    header.write("ustar\0", 257, 6, "utf8");
    header.write("00", 263, 2, "utf8");
    header.write(prefix, 345, PREFIX_LEN, "utf8");

    const cksum = headerChecksum(header);
    header.write(padOctal(cksum, 7), 148, 7, "utf8");
    header[155] = 0x20;

    blocks.push(header);
    blocks.push(entry.data);
    const remainder = entry.data.length % BLOCK;
    if (remainder > 0) {
      blocks.push(Buffer.alloc(BLOCK - remainder, 0));
    }
  }

  // two zero blocks end the archive
  blocks.push(Buffer.alloc(BLOCK * 2, 0));

  return Buffer.concat(blocks);
}

/** Extract regular-file entries from an uncompressed tar buffer. */
export function extract(tar: Buffer): TarEntry[] {
  const entries: TarEntry[] = [];
  let offset = 0;

  while (offset + BLOCK <= tar.length) {
    const header = tar.subarray(offset, offset + BLOCK);
    if (header.every((b) => b === 0)) break;

    const base = readString(header, 0, NAME_LEN);
    const prefix = readString(header, 345, PREFIX_LEN);
    const size = parseInt(readString(header, 124, 12).trim(), 8);
    const mode = parseInt(readString(header, 100, 8).trim(), 8);
    if (isNaN(size)) throw new Error(`Corrupt tar header at byte ${offset}`);

    offset += BLOCK;
    entries.push({
      name: prefix ? `${prefix}/${base}` : base,
      data: Buffer.from(tar.subarray(offset, offset + size)),
      mode: isNaN(mode) ? undefined : mode,
    });

    offset += size;
    const remainder = size % BLOCK;
    if (remainder > 0) offset += BLOCK - remainder;
  }

  return entries;
}
