/**
 * Stream codecs using Superjson and MessagePack
 * 使用Superjson和MessagePack的数据流编解码器
 *
 * Superjson keeps Date, Map, Set and BigInt values inside component payloads
 * intact; MessagePack packs Superjson's serialized form into bytes.
 * Superjson保留组件载荷中的Date、Map、Set和BigInt值；MessagePack将
 * Superjson的序列化结果打包为字节。
 */

import superjson from 'superjson';
import { encode as msgpackEncode, decode as msgpackDecode } from '@msgpack/msgpack';
import { StreamFormat, type SaveStream } from './Types';
import { EncodingError, withEncoding } from './Errors';
import { parseStream } from './StreamSchema';

type SuperjsonResult = Parameters<typeof superjson.deserialize>[0];

/**
 * Encoded stream: text for JSON, bytes for binary
 * 编码后的数据流：JSON为文本，二进制为字节
 */
export type EncodedStream = string | Uint8Array;

export interface EncodeOptions {
  format?: StreamFormat;
  /** Indent JSON output 格式化JSON输出 */
  prettyPrint?: boolean;
}

function isSuperjsonResult(value: unknown): value is SuperjsonResult {
  return typeof value === 'object' && value !== null && !Array.isArray(value) && 'json' in value;
}

/**
 * Encode a stream to the requested format
 * 将数据流编码为指定格式
 *
 * @example
 * ```typescript
 * const text = encodeStream(stream, { format: StreamFormat.JSON, prettyPrint: true });
 * const bytes = encodeStream(stream, { format: StreamFormat.Binary });
 * ```
 */
export function encodeStream(stream: SaveStream, options: EncodeOptions = {}): EncodedStream {
  const format = options.format ?? StreamFormat.JSON;

  switch (format) {
    case StreamFormat.JSON:
      return withEncoding('JSON encoding failed', () => {
        const jsonString = superjson.stringify(stream);
        return options.prettyPrint ? JSON.stringify(JSON.parse(jsonString), null, 2) : jsonString;
      });

    case StreamFormat.Binary:
      return withEncoding('Binary encoding failed', () => {
        // Superjson first so rich payload values survive, then MessagePack
        const serialized = superjson.serialize(stream);
        return new Uint8Array(msgpackEncode(serialized));
      });

    default:
      throw new EncodingError(`Unsupported stream format: ${String(format)}`);
  }
}

/**
 * Decode text or bytes into a validated stream; the format follows the input type
 * 将文本或字节解码为经校验的数据流；格式由输入类型决定
 */
export function decodeStream(data: EncodedStream): SaveStream {
  const decoded = withEncoding<unknown>('Stream decoding failed', () => {
    if (typeof data === 'string') {
      return superjson.parse<unknown>(data);
    }

    const unpacked = msgpackDecode(data);
    if (!isSuperjsonResult(unpacked)) {
      throw new EncodingError('Binary stream does not contain a serialized payload');
    }
    return superjson.deserialize<unknown>(unpacked);
  });

  return parseStream(decoded);
}

/**
 * Detached copy of an in-memory stream, validated like a decoded one
 * 内存中数据流的独立副本，按解码后的数据流同样校验
 *
 * Payloads come out as they would after an encode/decode round trip, so a
 * world loaded from the copy shares no nested values with the saved one.
 * 载荷与编码/解码往返后的结果一致，读入的世界不会与存档世界共享嵌套值。
 */
export function copyStream(stream: SaveStream): SaveStream {
  const copy = withEncoding<unknown>('Stream copy failed', () =>
    superjson.deserialize<unknown>(superjson.serialize(stream))
  );
  return parseStream(copy);
}

/**
 * Format implied by an encoded value
 * 编码值所对应的格式
 */
export function formatOf(data: EncodedStream): StreamFormat {
  return typeof data === 'string' ? StreamFormat.JSON : StreamFormat.Binary;
}
