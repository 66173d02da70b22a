/**
 * Default ZarrChecksumCalculator
 *
 * Each directory digest is the MD5 of the JSON listing of its immediate
 * children ({directories, files}, each sorted by name, entries as
 * {digest, name, size}), rendered as `{md5}-{fileCount}--{size}`. File
 * digests are their etags. The archive checksum is the root digest.
 */

import { bytesToHex, type HashProvider } from "@dandiset/storage-core";
import type { ZarrUploadFile } from "../types.ts";

export type ZarrChecksumCalculator = {
  compute: (files: ZarrUploadFile[]) => Promise<string>;
};

type Entry = { digest: string; name: string; size: number };

type DirNode = {
  files: Map<string, Entry>;
  dirs: Map<string, DirNode>;
};

const newDir = (): DirNode => ({ files: new Map(), dirs: new Map() });

const byName = (a: Entry, b: Entry): number => (a.name < b.name ? -1 : a.name > b.name ? 1 : 0);

const buildTree = (files: ZarrUploadFile[]): DirNode => {
  const root = newDir();
  for (const file of files) {
    const segments = file.path.split("/");
    const name = segments.pop() ?? file.path;
    let dir = root;
    for (const segment of segments) {
      let child = dir.dirs.get(segment);
      if (!child) {
        child = newDir();
        dir.dirs.set(segment, child);
      }
      dir = child;
    }
    dir.files.set(name, { digest: file.etag, name, size: file.size });
  }
  return root;
};

export const createZarrChecksumCalculator = (hash: HashProvider): ZarrChecksumCalculator => {
  const encoder = new TextEncoder();

  const digestDir = async (
    dir: DirNode
  ): Promise<{ digest: string; count: number; size: number }> => {
    const files = [...dir.files.values()].sort(byName);
    const directories: Entry[] = [];
    let count = files.length;
    let size = files.reduce((sum, f) => sum + f.size, 0);

    for (const [name, child] of dir.dirs) {
      const digest = await digestDir(child);
      directories.push({ digest: digest.digest, name, size: digest.size });
      count += digest.count;
      size += digest.size;
    }
    directories.sort(byName);

    const listing = JSON.stringify({ directories, files });
    const md5 = bytesToHex(await hash.md5(encoder.encode(listing)));
    return { digest: `${md5}-${count}--${size}`, count, size };
  };

  return {
    compute: async (files) => (await digestDir(buildTree(files))).digest,
  };
};
