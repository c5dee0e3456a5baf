import { FindOperator, Raw } from 'typeorm';

/** Storage a tag sequence is allocated against. */
export interface TaggedRepository {
  /** Up to `limit` existing tags starting with `prefix`, highest first. */
  findTagsWithPrefix(prefix: string, limit: number): Promise<string[]>;
  tagExists(tag: string): Promise<boolean>;
}

/**
 * Case-sensitive "starts with" condition for a tag column. `LIKE` folds
 * case on SQLite, which would let look-alike tags crowd the scan window.
 */
export function tagPrefixCondition(prefix: string): FindOperator<string> {
  return Raw((column) => `SUBSTR(${column}, 1, :tagPrefixLength) = :tagPrefix`, {
    tagPrefix: prefix,
    tagPrefixLength: prefix.length,
  });
}
