/**
 * Save/load error hierarchy
 * 存档/读档错误层级
 *
 * Every failure aborts the running operation. Callers tell the cases apart
 * by `kind` or by `instanceof`.
 * 所有失败都会中止当前操作。调用方可通过 `kind` 或 `instanceof` 区分。
 */

import type { Entity } from '../utils/Types';
import type { Ordinal } from './Types';

/**
 * Save/load error kinds
 * 存档/读档错误类型
 */
export type SaveLoadErrorKind =
  | 'UnknownEntity'
  | 'DuplicateEntity'
  | 'UnsupportedType'
  | 'EncodingError';

/**
 * Base class for all save/load failures
 * 所有存档/读档失败的基类
 */
export abstract class SaveLoadError extends Error {
  abstract readonly kind: SaveLoadErrorKind;

  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
  }
}

/**
 * A reference points outside the persisted subset, or an ordinal was never defined
 * 引用指向持久化子集之外，或序号从未定义
 */
export class UnknownEntityError extends SaveLoadError {
  readonly kind = 'UnknownEntity' as const;

  constructor(
    message: string,
    readonly entity?: Entity,
    readonly ordinal?: Ordinal
  ) {
    super(message);
  }

  static forEntity(entity: Entity): UnknownEntityError {
    return new UnknownEntityError(
      `Entity ${entity} is referenced but not part of the persisted (marked) set`,
      entity
    );
  }

  static forOrdinal(ordinal: number, entityCount?: number): UnknownEntityError {
    const range = entityCount === undefined ? '' : ` (stream defines ordinals 0..${entityCount - 1})`;
    return new UnknownEntityError(`Ordinal ${ordinal} is not defined by this stream${range}`, undefined, ordinal);
  }
}

/**
 * The marked sequence yielded the same live entity twice
 * 标记序列中出现了重复的实体
 */
export class DuplicateEntityError extends SaveLoadError {
  readonly kind = 'DuplicateEntity' as const;

  constructor(readonly entity: Entity) {
    super(`Entity ${entity} appears more than once in the marked set`);
  }
}

/**
 * The type list names a type that has no registration
 * 类型列表中包含未注册的类型
 */
export class UnsupportedTypeError extends SaveLoadError {
  readonly kind = 'UnsupportedType' as const;

  constructor(message: string, readonly typeName: string) {
    super(message);
  }
}

/**
 * Encoder/decoder or per-type codec failure, or a malformed stream
 * 编解码器或类型编解码失败，或数据流格式错误
 */
export class EncodingError extends SaveLoadError {
  readonly kind = 'EncodingError' as const;
}

/**
 * Run `fn`, wrapping foreign failures as EncodingError; save/load errors pass through
 * 执行 `fn`，将外部失败包装为EncodingError；存档/读档错误原样抛出
 */
export function withEncoding<R>(context: string, fn: () => R): R {
  try {
    return fn();
  } catch (error) {
    if (error instanceof SaveLoadError) throw error;
    const reason = error instanceof Error ? error.message : String(error);
    throw new EncodingError(`${context}: ${reason}`, { cause: error });
  }
}
