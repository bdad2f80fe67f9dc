/**
 * @otptoken/common - Directory collaborators
 *
 * Interfaces of the record store and identity directory the token
 * manager relies on, and an in-memory implementation of both for tests.
 *
 * @packageDocumentation
 */

import { DuplicateEntryError, NotFoundError } from "./errors";
import { matchFilter, parseFilter } from "./filter";
import {
  ATTR,
  type AttributeChanges,
  type AttributeMap,
  type AttributeValue,
} from "./types";

/**
 * Token record store
 *
 * Implementations own atomicity: the manager reads a record, validates
 * and then writes it without locking.
 */
export interface TokenStore {
  /**
   * Store a new record
   * @param objectClasses Schema classes of the record
   * @param attributes Record attributes, including its unique id
   * @returns Record id
   */
  createRecord(
    objectClasses: readonly string[],
    attributes: AttributeMap,
  ): Promise<string>;

  /**
   * Read a record, including its objectClass
   * @throws NotFoundError when the id is unknown
   */
  readRecord(id: string): Promise<AttributeMap>;

  /**
   * Apply a partial modification
   * @returns The updated record
   * @throws NotFoundError when the id is unknown
   */
  updateRecord(id: string, changes: AttributeChanges): Promise<AttributeMap>;

  /**
   * @throws NotFoundError when the id is unknown
   */
  deleteRecord(id: string): Promise<void>;

  /**
   * Search records matching an RFC 4515 filter
   * @param attributes Attributes to return (default: all)
   */
  search(filter: string, attributes?: readonly string[]): Promise<AttributeMap[]>;
}

/**
 * User principal lookups
 */
export interface IdentityDirectory {
  /**
   * Resolve a user identifier to its storage-canonical reference
   * @throws NotFoundError when the identifier is unknown
   */
  resolveIdentity(identifier: string): Promise<string>;

  /**
   * Convert a canonical reference back to its display identifier
   */
  identifierOf(reference: string): Promise<string>;

  /**
   * Read one attribute of a principal
   * @returns First value, or undefined when absent
   */
  lookupAttribute(reference: string, attribute: string): Promise<string | undefined>;
}

function copyValue(value: AttributeValue): AttributeValue {
  if (Array.isArray(value)) return [...value];
  if (value instanceof Date) return new Date(value.getTime());
  if (value instanceof Uint8Array) return Uint8Array.from(value);
  return value;
}

function copyEntry(entry: AttributeMap): AttributeMap {
  const copy: AttributeMap = {};
  for (const [name, value] of Object.entries(entry)) {
    copy[name] = copyValue(value);
  }
  return copy;
}

interface StoredUser {
  uid: string;
  attributes: Record<string, string>;
}

/**
 * In-memory store and identity directory
 * In production, use a directory-backed implementation
 */
export class InMemoryDirectory implements TokenStore, IdentityDirectory {
  private records = new Map<string, AttributeMap>();
  private users = new Map<string, StoredUser>();

  constructor(private basedn = "dc=example,dc=com") {}

  /**
   * Register a user principal
   * @returns Its canonical reference
   */
  addUser(uid: string, attributes: Record<string, string> = {}): string {
    const reference = this.userReference(uid);
    this.users.set(reference.toLowerCase(), { uid, attributes });
    return reference;
  }

  userReference(uid: string): string {
    return `uid=${uid},cn=users,cn=accounts,${this.basedn}`;
  }

  async createRecord(
    objectClasses: readonly string[],
    attributes: AttributeMap,
  ): Promise<string> {
    const id = attributes[ATTR.uniqueId];
    if (typeof id !== "string" || id === "") {
      throw new Error(`Missing ${ATTR.uniqueId} attribute`);
    }
    if (this.records.has(id)) {
      throw new DuplicateEntryError(id);
    }

    this.records.set(id, {
      ...copyEntry(attributes),
      [ATTR.objectClass]: [...objectClasses],
    });
    return id;
  }

  async readRecord(id: string): Promise<AttributeMap> {
    return copyEntry(this.getRecord(id));
  }

  async updateRecord(
    id: string,
    changes: AttributeChanges,
  ): Promise<AttributeMap> {
    const record = this.getRecord(id);

    for (const [name, value] of Object.entries(changes)) {
      if (value === null) {
        delete record[name];
      } else {
        record[name] = copyValue(value);
      }
    }
    return copyEntry(record);
  }

  async deleteRecord(id: string): Promise<void> {
    this.getRecord(id);
    this.records.delete(id);
  }

  async search(
    filter: string,
    attributes?: readonly string[],
  ): Promise<AttributeMap[]> {
    const node = parseFilter(filter);
    const wanted = attributes?.map((a) => a.toLowerCase());

    const entries: AttributeMap[] = [];
    for (const record of this.records.values()) {
      if (!matchFilter(node, record)) continue;

      const entry = copyEntry(record);
      if (wanted) {
        for (const name of Object.keys(entry)) {
          if (!wanted.includes(name.toLowerCase())) delete entry[name];
        }
      }
      entries.push(entry);
    }
    return entries;
  }

  async resolveIdentity(identifier: string): Promise<string> {
    const reference = this.userReference(identifier);
    if (!this.users.has(reference.toLowerCase())) {
      throw new NotFoundError(identifier);
    }
    return reference;
  }

  async identifierOf(reference: string): Promise<string> {
    const user = this.users.get(reference.toLowerCase());
    if (user) return user.uid;

    // Unknown principal: fall back on the RDN value
    const match = /^[^=,]+=([^,]+)/.exec(reference);
    return match ? match[1] : reference;
  }

  async lookupAttribute(
    reference: string,
    attribute: string,
  ): Promise<string | undefined> {
    const user = this.users.get(reference.toLowerCase());
    if (!user) {
      throw new NotFoundError(reference);
    }
    return user.attributes[attribute];
  }

  /**
   * Number of stored records
   */
  get size(): number {
    return this.records.size;
  }

  private getRecord(id: string): AttributeMap {
    const record = this.records.get(id);
    if (!record) {
      throw new NotFoundError(id, "OTP token");
    }
    return record;
  }
}
