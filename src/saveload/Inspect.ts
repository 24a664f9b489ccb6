/**
 * Save stream summaries, readable without registering any component type
 * 无需注册组件类型即可读取的存档数据流摘要
 */

import type { Ordinal, SaveStream } from './Types';

export interface BlockSummary {
  type: string;
  records: number;
  /** Lowest and highest ordinal in the block, null when empty 块中最小与最大序号，为空时为null */
  ordinals: [min: Ordinal, max: Ordinal] | null;
}

export interface StreamSummary {
  format: string;
  entityCount: number;
  totalRecords: number;
  blocks: BlockSummary[];
  /** Ordinals that own no record in any block (reference-only or component-less) 未在任何块中拥有记录的序号 */
  bareOrdinals: number;
}

export function summarizeStream(stream: SaveStream): StreamSummary {
  const owners = new Set<Ordinal>();

  const blocks = stream.blocks.map((block): BlockSummary => {
    let min = Infinity;
    let max = -Infinity;
    for (const [ordinal] of block.records) {
      owners.add(ordinal);
      if (ordinal < min) min = ordinal;
      if (ordinal > max) max = ordinal;
    }
    return {
      type: block.type,
      records: block.records.length,
      ordinals: block.records.length > 0 ? [min, max] : null
    };
  });

  return {
    format: stream.format,
    entityCount: stream.entityCount,
    totalRecords: blocks.reduce((sum, block) => sum + block.records, 0),
    blocks,
    bareOrdinals: Math.max(0, stream.entityCount - owners.size)
  };
}
