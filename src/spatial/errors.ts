export type SpatialIndexErrorCode = 'EMPTY_INPUT' | 'INVARIANT_VIOLATION';

/**
 * 空间索引错误基类
 */
export class SpatialIndexError extends Error {
  constructor(
    message: string,
    public readonly code: SpatialIndexErrorCode,
  ) {
    super(message);
    this.name = 'SpatialIndexError';
  }
}

/**
 * 使用空记录集构建索引
 */
export class EmptyInputError extends SpatialIndexError {
  constructor(message = '无法使用空的职位集合构建空间索引') {
    super(message, 'EMPTY_INPUT');
    this.name = 'EmptyInputError';
  }
}

/**
 * 内部一致性被破坏，属于程序缺陷
 */
export class InvariantViolationError extends SpatialIndexError {
  constructor(
    message: string,
    public readonly nodeId?: number,
  ) {
    super(message, 'INVARIANT_VIOLATION');
    this.name = 'InvariantViolationError';
  }
}
