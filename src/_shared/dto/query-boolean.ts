import type { TransformFnParams } from 'class-transformer';

/**
 * Query strings arrive as text; only true and "true" mean true
 */
export const queryBoolean = ({ value }: TransformFnParams): unknown =>
  value === undefined ? undefined : value === true || value === 'true';
