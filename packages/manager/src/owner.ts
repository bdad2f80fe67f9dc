/**
 * @otptoken/manager - Owner and manager resolution
 *
 * Owners and managers are stored as canonical principal references and
 * shown to callers as user identifiers.
 *
 * @packageDocumentation
 */

import {
  NotFoundError,
  type IdentityDirectory,
  type TokenOutputOptions,
  type TokenView,
} from "@otptoken/common";
import type { OTP_Logger } from "@otptoken/types";

export interface Ownership {
  /** Owner reference */
  owner?: string;
  /** Manager references */
  managedBy: string[];
}

function sameReference(a: string, b: string): boolean {
  return a.toLowerCase() === b.toLowerCase();
}

/**
 * A token managed by its owner alone, or with neither owner nor manager
 */
export function isSelfManaged(ownership: Ownership): boolean {
  const { owner, managedBy } = ownership;
  if (owner === undefined) return managedBy.length === 0;
  return managedBy.length === 1 && sameReference(owner, managedBy[0]);
}

export class OwnerResolver {
  constructor(
    private identities: IdentityDirectory,
    private logger: OTP_Logger,
  ) {}

  /**
   * Resolve a user identifier to its reference
   * @throws NotFoundError naming the identifier
   */
  normalize(identifier: string): Promise<string> {
    return this.identities.resolveIdentity(identifier);
  }

  /**
   * Replace stored references by user identifiers, unless raw output
   * was requested
   */
  async denormalize<T extends TokenView>(
    view: T,
    options: TokenOutputOptions = {},
  ): Promise<T> {
    if (options.raw) return view;

    const result = { ...view };
    if (view.owner !== undefined) {
      result.owner = await this.identities.identifierOf(view.owner);
    }
    if (view.managedBy !== undefined) {
      result.managedBy = await Promise.all(
        view.managedBy.map((ref) => this.identities.identifierOf(ref)),
      );
    }
    return result;
  }

  /**
   * Ownership of a new token
   *
   * A missing owner defaults to the caller. A missing manager defaults to
   * the caller when the caller ends up owning the token. A caller without
   * user entry gets no defaults.
   *
   * @param requested Owner and manager identifiers given by the caller
   * @param caller Identifier of the calling principal
   */
  async defaultOwnership(
    requested: { owner?: string; manager?: string },
    caller?: string,
  ): Promise<Ownership> {
    let owner = requested.owner;
    let manager =
      requested.manager !== undefined
        ? await this.normalize(requested.manager)
        : undefined;

    const callerReference =
      caller !== undefined && (owner === undefined || manager === undefined)
        ? await this.callerReference(caller)
        : undefined;

    if (caller !== undefined && callerReference !== undefined) {
      if (owner === undefined) {
        owner = caller;
      }
      if (owner === caller && manager === undefined) {
        manager = callerReference;
      }
    }

    return {
      owner: owner !== undefined ? await this.normalize(owner) : undefined,
      managedBy: manager !== undefined ? [manager] : [],
    };
  }

  private async callerReference(caller: string): Promise<string | undefined> {
    try {
      return await this.normalize(caller);
    } catch (e) {
      if (!(e instanceof NotFoundError)) throw e;
      this.logger.debug(`Caller ${caller} has no user entry, no ownership defaults`);
      return undefined;
    }
  }

  /**
   * Managers to store when the owner changes without an explicit manager:
   * a self-managed token follows its new owner, any other keeps its
   * managers. A token with neither owner nor manager counts as
   * self-managed.
   *
   * @param newOwner Reference of the new owner
   * @param previous Ownership currently stored
   * @returns New managers, or undefined to leave them unchanged
   */
  reassignManagers(newOwner: string, previous: Ownership): string[] | undefined {
    if (previous.owner !== undefined && sameReference(newOwner, previous.owner)) {
      return undefined;
    }
    return isSelfManaged(previous) ? [newOwner] : undefined;
  }
}
