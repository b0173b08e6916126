import { v4 as uuidv4 } from 'uuid';

/**
 * Abstraction over record-id generation to support deterministic tests.
 */
export interface IdGenerator {
  newId(): string;
}

/**
 * Generates random UUID v4 ids, the form the worksheets' ID column uses.
 */
export class UuidIdGenerator implements IdGenerator {
  newId(): string {
    return uuidv4();
  }
}

/**
 * A deterministic generator that returns a pre-seeded sequence of ids.
 *
 * Throws if you request more ids than provided.
 */
export class FixedIdGenerator implements IdGenerator {
  private readonly ids: string[];

  constructor(ids: Iterable<string>) {
    this.ids = Array.from(ids);
  }

  newId(): string {
    const id = this.ids.shift();
    if (id === undefined) {
      throw new Error('fixed id generator exhausted');
    }
    return id;
  }
}
