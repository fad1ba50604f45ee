import type { Block, BlockRepository } from '../types';

/** In-process stand-in for the block store. */
export class InMemoryBlockRepository implements BlockRepository {
  private readonly days = new Map<string, Block[]>();
  failSaves = false;

  async load(date: string): Promise<Block[]> {
    return structuredClone(this.days.get(date) ?? []);
  }

  async save(block: Block): Promise<void> {
    if (this.failSaves) {
      throw new Error('disk full');
    }
    const blocks = (this.days.get(block.date) ?? []).filter((b) => b.blockIndex !== block.blockIndex);
    blocks.push(structuredClone(block));
    blocks.sort((a, b) => a.blockIndex - b.blockIndex);
    this.days.set(block.date, blocks);
  }

  async find(date: string, blockIndex: number): Promise<Block | undefined> {
    return (await this.load(date)).find((b) => b.blockIndex === blockIndex);
  }
}
