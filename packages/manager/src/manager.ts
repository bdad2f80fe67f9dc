/**
 * OTP token manager
 *
 * Runs the token operations against the store: parameters are validated
 * and normalized before the store is called, stored entries are
 * converted back for the caller afterwards.
 *
 * @packageDocumentation
 */

import { randomUUID } from "crypto";
import {
  ATTR,
  EmptyModlistError,
  INFO_FIELDS,
  NotFoundError,
  isTokenType,
  type AttributeChanges,
  type AttributeMap,
  type IdentityDirectory,
  type MembershipResult,
  type OperationContext,
  type Token,
  type TokenAddParams,
  type TokenAddResult,
  type TokenFindOptions,
  type TokenFindParams,
  type TokenFindResult,
  type TokenModParams,
  type TokenOutputOptions,
  type TokenStore,
  type TokenView,
} from "@otptoken/common";
import { convertKey, generateKey } from "@otptoken/key";
import { withPrefix } from "@otptoken/logger";
import type { OTP_Conf, OTP_Logger } from "@otptoken/types";
import {
  validateCreateInterval,
  validateUpdateInterval,
  type ValidityBounds,
} from "./interval";
import { OwnerResolver, type Ownership } from "./owner";
import { buildToken, checkDate, foreignFields } from "./params";
import {
  dateValue,
  entryToView,
  resolveTokenType,
  stringList,
  stringValue,
  tokenAttributes,
  tokenObjectClasses,
} from "./schema";
import { buildSearchFilter, rewriteSearchFilter } from "./search";
import { buildProvisioningUri, resolveIssuer } from "./uri";

export interface TokenManagerOptions {
  store: TokenStore;
  identities: IdentityDirectory;
  conf: Pick<OTP_Conf, "realm" | "issuerAttribute">;
  logger: OTP_Logger;
}

/**
 * State carried from the validation phase of a creation to the output
 * phase. The URI is never stored.
 */
interface AddState {
  token: Token;
  uri: string;
}

/**
 * Memoize a read so that an operation hits the store at most once
 */
function once<T>(read: () => Promise<T>): () => Promise<T> {
  let pending: Promise<T> | undefined;
  return () => {
    if (!pending) pending = read();
    return pending;
  };
}

function boundsOf(entry: AttributeMap): ValidityBounds {
  return {
    notBefore: dateValue(entry[ATTR.notBefore]),
    notAfter: dateValue(entry[ATTR.notAfter]),
  };
}

function ownershipOf(entry: AttributeMap): Ownership {
  return {
    owner: stringValue(entry[ATTR.owner]),
    managedBy: stringList(entry[ATTR.managedBy]),
  };
}

function sameReference(a: string, b: string): boolean {
  return a.toLowerCase() === b.toLowerCase();
}

/**
 * OTP token manager
 */
export class TokenManager {
  private store: TokenStore;
  private identities: IdentityDirectory;
  private conf: Pick<OTP_Conf, "realm" | "issuerAttribute">;
  private logger: OTP_Logger;
  private owners: OwnerResolver;

  constructor(options: TokenManagerOptions) {
    this.store = options.store;
    this.identities = options.identities;
    this.conf = options.conf;
    this.logger = withPrefix(options.logger, "otptoken");
    this.owners = new OwnerResolver(options.identities, this.logger);
  }

  /**
   * Add a new token
   * @returns The stored token and its provisioning URI
   */
  async add(
    params: TokenAddParams,
    options: TokenOutputOptions = {},
    context: OperationContext = {},
  ): Promise<TokenAddResult> {
    const state = await this.prepareAdd(params, context);

    const id = await this.store.createRecord(
      tokenObjectClasses(state.token.type),
      tokenAttributes(state.token),
    );
    this.logger.info(`Added OTP token "${id}"`);

    const entry = await this.store.readRecord(id);
    const view = await this.present(entry, options);
    return { ...view, uri: state.uri };
  }

  private async prepareAdd(
    params: TokenAddParams,
    context: OperationContext,
  ): Promise<AddState> {
    const type = resolveTokenType(params.type);

    const ignored = foreignFields(type, params);
    if (ignored.length > 0) {
      this.logger.debug(`Ignoring ${ignored.join(", ")} for a ${type} token`);
    }

    const token = buildToken(
      {
        id: params.id ?? randomUUID(),
        type,
        key: params.key !== undefined ? convertKey(params.key) : generateKey(),
      },
      params,
    );
    validateCreateInterval(token);

    const ownership = await this.owners.defaultOwnership(
      { owner: params.owner, manager: params.manager },
      context.caller,
    );
    token.owner = ownership.owner;
    token.managedBy = ownership.managedBy;

    const issuer = await resolveIssuer(
      this.identities,
      this.conf,
      this.logger,
      token.owner,
    );
    return { token, uri: buildProvisioningUri(token, issuer) };
  }

  /**
   * Modify a token
   */
  async mod(
    id: string,
    params: TokenModParams,
    options: TokenOutputOptions = {},
  ): Promise<TokenView> {
    const stored = once(() => this.store.readRecord(id));

    checkDate("notBefore", params.notBefore);
    checkDate("notAfter", params.notAfter);
    await validateUpdateInterval(
      { notBefore: params.notBefore, notAfter: params.notAfter },
      async () => boundsOf(await stored()),
    );

    const changes: AttributeChanges = {};

    if (params.owner !== undefined) {
      const owner = await this.owners.normalize(params.owner);
      changes[ATTR.owner] = owner;

      if (params.manager === undefined) {
        const managers = this.owners.reassignManagers(
          owner,
          ownershipOf(await stored()),
        );
        if (managers) {
          this.logger.debug(`Token "${id}" follows its new owner ${owner}`);
          changes[ATTR.managedBy] = managers;
        }
      }
    }
    if (params.manager !== undefined) {
      changes[ATTR.managedBy] = [await this.owners.normalize(params.manager)];
    }
    if (params.disabled !== undefined) changes[ATTR.disabled] = params.disabled;
    if (params.notBefore !== undefined) changes[ATTR.notBefore] = params.notBefore;
    if (params.notAfter !== undefined) changes[ATTR.notAfter] = params.notAfter;
    for (const field of INFO_FIELDS) {
      const value = params[field];
      if (value !== undefined) changes[ATTR[field]] = value;
    }

    if (Object.keys(changes).length === 0) {
      throw new EmptyModlistError();
    }

    const entry = await this.store.updateRecord(id, changes);
    this.logger.info(`Modified OTP token "${id}"`);
    return this.present(entry, options);
  }

  /**
   * Display a token
   */
  async show(id: string, options: TokenOutputOptions = {}): Promise<TokenView> {
    const entry = await this.store.readRecord(id);
    return this.present(entry, options);
  }

  /**
   * Search tokens
   */
  async find(
    params: TokenFindParams = {},
    options: TokenFindOptions = {},
  ): Promise<TokenFindResult> {
    const owner =
      params.owner !== undefined
        ? await this.owners.normalize(params.owner)
        : undefined;

    if (params.type !== undefined && !isTokenType(params.type.toLowerCase())) {
      this.logger.debug(`Ignoring unknown token type "${params.type}" in search`);
    }
    const filter = rewriteSearchFilter(buildSearchFilter(params, owner), params.type);
    this.logger.debug(`Searching tokens with ${filter}`);

    const attributes = options.pkeyOnly ? [ATTR.uniqueId, ATTR.objectClass] : undefined;
    const entries = await this.store.search(filter, attributes);
    const result = await Promise.all(
      entries.map((entry) => this.present(entry, options)),
    );

    return { count: result.length, result };
  }

  /**
   * Delete a token
   */
  async del(id: string): Promise<{ value: string }> {
    await this.store.deleteRecord(id);
    this.logger.info(`Deleted OTP token "${id}"`);
    return { value: id };
  }

  /**
   * Add users that can manage a token
   */
  async addManagedBy(
    id: string,
    users: string[],
    options: TokenOutputOptions = {},
  ): Promise<MembershipResult> {
    return this.changeManagedBy(id, users, options, (managers, ref) => {
      if (managers.some((m) => sameReference(m, ref))) {
        return "This entry is already a member";
      }
      managers.push(ref);
      return undefined;
    });
  }

  /**
   * Remove users that can manage a token
   */
  async removeManagedBy(
    id: string,
    users: string[],
    options: TokenOutputOptions = {},
  ): Promise<MembershipResult> {
    return this.changeManagedBy(id, users, options, (managers, ref) => {
      const idx = managers.findIndex((m) => sameReference(m, ref));
      if (idx === -1) return "This entry is not a member";
      managers.splice(idx, 1);
      return undefined;
    });
  }

  /**
   * Apply a membership change per user
   * @param apply Mutates the manager list, or returns the failure reason
   */
  private async changeManagedBy(
    id: string,
    users: string[],
    options: TokenOutputOptions,
    apply: (managers: string[], reference: string) => string | undefined,
  ): Promise<MembershipResult> {
    let entry = await this.store.readRecord(id);
    const managers = stringList(entry[ATTR.managedBy]);
    const failed: Record<string, string> = {};
    let completed = 0;

    for (const user of users) {
      let reference: string;
      try {
        reference = await this.owners.normalize(user);
      } catch (e) {
        if (!(e instanceof NotFoundError)) throw e;
        failed[user] = "no such entry";
        continue;
      }

      const failure = apply(managers, reference);
      if (failure) {
        failed[user] = failure;
      } else {
        completed++;
      }
    }

    if (completed > 0) {
      entry = await this.store.updateRecord(id, {
        [ATTR.managedBy]: managers.length > 0 ? managers : null,
      });
      this.logger.info(`Updated managers of OTP token "${id}"`);
    }

    return { completed, failed, result: await this.present(entry, options) };
  }

  private present(
    entry: AttributeMap,
    options: TokenFindOptions,
  ): Promise<TokenView> {
    return this.owners.denormalize(entryToView(entry, options), options);
  }
}

export default TokenManager;
