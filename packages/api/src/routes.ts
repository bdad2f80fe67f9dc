/**
 * OTP token routes
 *
 * Exposes the token manager as a JSON API
 *
 * @packageDocumentation
 */

import express, {
  Router,
  type NextFunction,
  type Request,
  type Response,
} from "express";
import {
  DuplicateEntryError,
  NotFoundError,
  OTPTokenError,
  ValidationError,
  type OTPTokenErrorBody,
} from "@otptoken/common";
import type { TokenManager } from "@otptoken/manager";
import type { TokenSyncClient } from "@otptoken/sync";
import type { OTP_Logger } from "@otptoken/types";
import {
  parseAddParams,
  parseFindParams,
  parseModParams,
  parseOutputOptions,
  parseSyncParams,
  parseUsers,
} from "./params";

export interface TokenRoutesOptions {
  logger: OTP_Logger;
  /** Identifier of the authenticated caller (default: Remote-User header) */
  getCaller?: (req: Request) => string | undefined;
  /** Enables POST /otptoken/sync */
  sync?: TokenSyncClient;
}

export function errorStatus(e: unknown): number {
  if (e instanceof NotFoundError) return 404;
  if (e instanceof DuplicateEntryError) return 409;
  if (e instanceof OTPTokenError) return 400;
  return 500;
}

const INTERNAL_ERROR: OTPTokenErrorBody = {
  error: "InternalError",
  message: "Internal server error",
};

/**
 * Create OTP token routes
 */
export function createTokenRoutes(
  manager: TokenManager,
  options: TokenRoutesOptions,
): Router {
  const router = Router();
  const { logger, sync } = options;
  const getCaller =
    options.getCaller ?? ((req: Request) => req.get("Remote-User"));

  const sendError = (res: Response, e: unknown, action: string): void => {
    const status = errorStatus(e);
    if (status === 500) {
      logger.error(`${action} failed: ${e}`);
      res.status(500).json(INTERNAL_ERROR);
      return;
    }
    logger.info(`${action} rejected: ${e instanceof Error ? e.message : e}`);
    res.status(status).json(e);
  };

  router.use(express.json());

  /**
   * POST /otptoken - Add a token
   */
  router.post("/otptoken", async (req: Request, res: Response) => {
    try {
      const result = await manager.add(
        parseAddParams(req.body),
        parseOutputOptions(req.query),
        { caller: getCaller(req) },
      );
      // The provisioning URI carries the key
      res.set("Cache-Control", "no-store");
      res.status(201).json(result);
    } catch (e) {
      sendError(res, e, "Token creation");
    }
  });

  /**
   * GET /otptoken - Search tokens
   */
  router.get("/otptoken", async (req: Request, res: Response) => {
    try {
      res.json(
        await manager.find(parseFindParams(req.query), parseOutputOptions(req.query)),
      );
    } catch (e) {
      sendError(res, e, "Token search");
    }
  });

  /**
   * POST /otptoken/sync - Resynchronize a token
   */
  router.post("/otptoken/sync", async (req: Request, res: Response) => {
    if (!sync) {
      res.status(404).json({ error: "NotFoundError", message: "sync is not enabled" });
      return;
    }
    try {
      res.json(await sync.sync(parseSyncParams(req.body)));
    } catch (e) {
      sendError(res, e, "Token synchronization");
    }
  });

  /**
   * GET /otptoken/:id - Display a token
   */
  router.get("/otptoken/:id", async (req: Request, res: Response) => {
    try {
      res.json(await manager.show(req.params.id, parseOutputOptions(req.query)));
    } catch (e) {
      sendError(res, e, `Token ${req.params.id} display`);
    }
  });

  /**
   * PATCH /otptoken/:id - Modify a token
   */
  router.patch("/otptoken/:id", async (req: Request, res: Response) => {
    try {
      res.json(
        await manager.mod(
          req.params.id,
          parseModParams(req.body),
          parseOutputOptions(req.query),
        ),
      );
    } catch (e) {
      sendError(res, e, `Token ${req.params.id} modification`);
    }
  });

  /**
   * DELETE /otptoken/:id - Delete a token
   */
  router.delete("/otptoken/:id", async (req: Request, res: Response) => {
    try {
      res.json(await manager.del(req.params.id));
    } catch (e) {
      sendError(res, e, `Token ${req.params.id} deletion`);
    }
  });

  /**
   * POST /otptoken/:id/managedby - Add managers
   */
  router.post("/otptoken/:id/managedby", async (req: Request, res: Response) => {
    try {
      res.json(
        await manager.addManagedBy(
          req.params.id,
          parseUsers(req.body),
          parseOutputOptions(req.query),
        ),
      );
    } catch (e) {
      sendError(res, e, `Token ${req.params.id} managers update`);
    }
  });

  /**
   * DELETE /otptoken/:id/managedby - Remove managers
   */
  router.delete("/otptoken/:id/managedby", async (req: Request, res: Response) => {
    try {
      res.json(
        await manager.removeManagedBy(
          req.params.id,
          parseUsers(req.body),
          parseOutputOptions(req.query),
        ),
      );
    } catch (e) {
      sendError(res, e, `Token ${req.params.id} managers update`);
    }
  });

  // Malformed JSON bodies
  router.use((err: unknown, _req: Request, res: Response, next: NextFunction) => {
    if (err instanceof SyntaxError) {
      sendError(res, new ValidationError("body", "malformed JSON"), "Request");
      return;
    }
    next(err);
  });

  return router;
}

export default createTokenRoutes;
