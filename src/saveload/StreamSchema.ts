/**
 * Save stream envelope validation
 * 存档数据流外层结构校验
 */

import { z } from 'zod';
import { SAVE_STREAM_FORMAT, type SaveStream } from './Types';
import { EncodingError } from './Errors';

// Ordinal ranges are checked by the load translator, which reports UnknownEntity
// 序号范围由读档转换器检查，并报告UnknownEntity
const RecordSchema = z.tuple([z.number(), z.unknown()]);

const TypeBlockSchema = z.object({
  type: z.string().min(1, { message: 'Block type tag cannot be empty' }),
  records: z.array(RecordSchema)
});

export const SaveStreamSchema = z.object({
  format: z.literal(SAVE_STREAM_FORMAT),
  entityCount: z
    .number()
    .int()
    .min(0, { message: 'Entity count must be a non-negative integer' }),
  blocks: z.array(TypeBlockSchema)
});

function describeIssues(error: z.ZodError): string {
  return error.issues
    .map(issue => `${issue.path.length > 0 ? issue.path.join('.') : '<root>'}: ${issue.message}`)
    .join('; ');
}

/**
 * Validate a decoded value as a save stream
 * 将解码后的值校验为存档数据流
 *
 * @throws EncodingError on a wrong format tag, a malformed envelope or a repeated block tag
 * 格式标签错误、结构错误或块标签重复时抛出EncodingError
 */
export function parseStream(input: unknown): SaveStream {
  const result = SaveStreamSchema.safeParse(input);
  if (!result.success) {
    throw new EncodingError(`Malformed save stream: ${describeIssues(result.error)}`, { cause: result.error });
  }

  const tags = new Set<string>();
  for (const block of result.data.blocks) {
    if (tags.has(block.type)) {
      throw new EncodingError(`Block "${block.type}" appears more than once in the stream`);
    }
    tags.add(block.type);
  }

  return result.data;
}
