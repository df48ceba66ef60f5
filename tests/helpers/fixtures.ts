import os from 'os';
import path from 'path';
import fs from 'fs-extra';

export interface StickerFixture {
  id?: unknown;
  info?: unknown;
}

export async function makeTempDir(prefix: string): Promise<string> {
  return fs.mkdtemp(path.join(os.tmpdir(), `${prefix}-`));
}

export async function writePack(packsDir: string, name: string, stickers: StickerFixture[]): Promise<string> {
  const packPath = path.join(packsDir, name);
  await fs.outputJson(packPath, { title: name, stickers });
  return packPath;
}

export function sticker(id: string, thumbnailUrl: string): StickerFixture {
  return { id, info: { thumbnail_url: thumbnailUrl, w: 256, h: 256 } };
}

export async function touchFiles(dir: string, names: string[]): Promise<void> {
  await fs.ensureDir(dir);
  for (const name of names) {
    await fs.outputFile(path.join(dir, name), `thumbnail ${name}`);
  }
}

export function uploadLine(mediaId: string, extra: Record<string, unknown> = {}): string {
  return JSON.stringify({ url: `mxc://example.org/${mediaId}`, ...extra });
}
