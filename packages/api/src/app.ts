/**
 * @otptoken/api - Application
 *
 * @packageDocumentation
 */

import express, { type Express, type Request } from "express";
import type { IdentityDirectory, TokenStore } from "@otptoken/common";
import { createLogger } from "@otptoken/logger";
import { TokenManager } from "@otptoken/manager";
import { TokenSyncClient, type FetchLike } from "@otptoken/sync";
import type { OTP_Conf, OTP_Logger } from "@otptoken/types";
import { createTokenRoutes } from "./routes";

export interface TokenAppOptions {
  conf: OTP_Conf;
  store: TokenStore;
  identities: IdentityDirectory;
  /** Default: console logger built from conf */
  logger?: OTP_Logger;
  getCaller?: (req: Request) => string | undefined;
  /** Sync transport (default: global fetch) */
  fetch?: FetchLike;
}

/**
 * Build the express application serving the token API. The sync route
 * is only mounted when xmlrpcUri is configured.
 */
export function createTokenApp(options: TokenAppOptions): Express {
  const { conf } = options;
  const logger = options.logger ?? createLogger(conf);

  const manager = new TokenManager({
    store: options.store,
    identities: options.identities,
    conf,
    logger,
  });
  const sync = conf.xmlrpcUri
    ? new TokenSyncClient({ conf, logger, fetch: options.fetch })
    : undefined;

  const app = express();
  app.disable("x-powered-by");
  app.use(
    createTokenRoutes(manager, { logger, getCaller: options.getCaller, sync }),
  );

  logger.notice(`OTP token API ready for realm ${conf.realm}`);
  return app;
}

export default createTokenApp;
