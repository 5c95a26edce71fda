/**
 * ClinicDesk - Gateway and Plugin Types
 */

import type { Static, TSchema } from "@sinclair/typebox";

import type { AccessContext, PermissionCheck } from "../auth/rbac.ts";
import type { ClinicConfig } from "../config/clinic-config.ts";
import type { Logger } from "../logger.ts";
import type { WriteContext } from "../repositories/context.ts";

/** The signed-in user on whose behalf a method runs. */
export type Session = AccessContext;

export type MethodContext = {
  session: Session | null;
  /** Actor and clock to pass to the repositories. */
  write: WriteContext & { now: Date };
  config: ClinicConfig;
  logger: Logger;
};

export type AuditSpec<P, R> = {
  action: string;
  resourceType: string;
  resourceId?: (params: P, result: R) => string | number | null | undefined;
};

export type MethodDefinition<S extends TSchema, R> = {
  description?: string;
  params: S;
  /** Checked against the session's role before the handler runs. */
  permission?: PermissionCheck;
  /** Callable without a session (login). */
  public?: boolean;
  /** Write an audit entry after the handler succeeds. */
  audit?: AuditSpec<Static<S>, R>;
  handler: (params: Static<S>, context: MethodContext) => R | Promise<R>;
};

export type MethodInfo = {
  name: string;
  description?: string;
  permission?: string;
  public: boolean;
};

export type ClinicPluginApi = {
  logger: Logger;
  config: ClinicConfig;
  registerGatewayMethod<S extends TSchema, R>(name: string, definition: MethodDefinition<S, R>): void;
};

export type ClinicPlugin = {
  id: string;
  name: string;
  description: string;
  version: string;
  register(api: ClinicPluginApi): void;
};
