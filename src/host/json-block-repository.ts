import { mkdir, readFile, writeFile } from 'node:fs/promises';
import { join } from 'node:path';
import { isBlock } from '@/lib/blocks/types';
import type { Block, BlockRepository } from '@/lib/blocks/types';
import { isNotFound } from './errors';

/** Stores each logical day as `<dir>/<yyyy-MM-dd>.json`, blocks sorted by index. */
export class JsonFileBlockRepository implements BlockRepository {
  constructor(private readonly dir: string) {}

  async load(date: string): Promise<Block[]> {
    const path = this.pathFor(date);
    let text: string;
    try {
      text = await readFile(path, 'utf8');
    } catch (err) {
      if (isNotFound(err)) return [];
      throw err;
    }

    const parsed: unknown = JSON.parse(text);
    if (!Array.isArray(parsed)) {
      throw new Error(`Block file ${path} must contain a JSON array`);
    }
    const blocks: Block[] = [];
    for (const entry of parsed) {
      if (!isBlock(entry)) {
        throw new Error(`Block file ${path} contains an invalid block`);
      }
      blocks.push(entry);
    }
    return blocks;
  }

  async save(block: Block): Promise<void> {
    const blocks = (await this.load(block.date)).filter((b) => b.blockIndex !== block.blockIndex);
    blocks.push(block);
    blocks.sort((a, b) => a.blockIndex - b.blockIndex);

    await mkdir(this.dir, { recursive: true });
    await writeFile(this.pathFor(block.date), `${JSON.stringify(blocks, null, 2)}\n`, 'utf8');
  }

  private pathFor(date: string): string {
    return join(this.dir, `${date}.json`);
  }
}
