import { ValueTransformer } from 'typeorm';

/** pg returns BIGINT columns as strings; GitHub ids stay below 2^53. */
export const numericTransformer: ValueTransformer = {
  to: (value: number | null | undefined) => value,
  from: (value: string | number | null) => (value === null ? null : Number(value)),
};
