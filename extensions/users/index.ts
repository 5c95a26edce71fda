/**
 * ClinicDesk - User Administration Extension
 *
 * Admin-only account management. Accounts are deactivated rather than
 * deleted.
 */

import { Type } from "@sinclair/typebox";

import { USER_ROLES } from "../../src/db/schema/users.ts";
import { ValidationError } from "../../src/errors.ts";
import { ById, Id, literalUnion } from "../../src/gateway/schemas.ts";
import type { ClinicPlugin, ClinicPluginApi } from "../../src/gateway/types.ts";
import {
  changePassword,
  createUser,
  deactivateUser,
  listUsers,
  reactivateUser,
  updateUser,
  updateUserRole,
} from "../../src/repositories/users.ts";

const Role = literalUnion(USER_ROLES);
const manage = { resource: "users", action: "manage" } as const;

const usersPlugin: ClinicPlugin = {
  id: "users",
  name: "User Administration",
  description: "Staff accounts, roles and password resets",
  version: "1.0.0",

  register(api: ClinicPluginApi) {
    api.logger.info("User Administration plugin registering...");

    api.registerGatewayMethod("users.list", {
      permission: manage,
      params: Type.Object({ includeInactive: Type.Optional(Type.Boolean()) }),
      handler(params) {
        return { users: listUsers(params) };
      },
    });

    api.registerGatewayMethod("users.create", {
      permission: manage,
      params: Type.Object({
        username: Type.String(),
        password: Type.String(),
        firstName: Type.String(),
        lastName: Type.String(),
        email: Type.String(),
        role: Type.Optional(Role),
      }),
      async handler(params) {
        return { user: await createUser(params) };
      },
      audit: { action: "create", resourceType: "user", resourceId: (_p, result) => result.user.id },
    });

    api.registerGatewayMethod("users.update", {
      permission: manage,
      params: Type.Object({
        id: Id,
        firstName: Type.Optional(Type.String()),
        lastName: Type.Optional(Type.String()),
        email: Type.Optional(Type.String()),
      }),
      handler(params) {
        const { id, ...changes } = params;
        return { user: updateUser(id, changes) };
      },
      audit: { action: "update", resourceType: "user", resourceId: (p) => p.id },
    });

    api.registerGatewayMethod("users.setRole", {
      permission: manage,
      params: Type.Object({ id: Id, role: Role }),
      handler(params, { session }) {
        if (session?.userId === params.id && params.role !== "admin") {
          throw new ValidationError("You cannot remove your own admin role", [
            { field: "role", message: "You cannot remove your own admin role" },
          ]);
        }
        return { user: updateUserRole(params.id, params.role) };
      },
      audit: { action: "role", resourceType: "user", resourceId: (p) => p.id },
    });

    api.registerGatewayMethod("users.deactivate", {
      permission: manage,
      params: ById,
      handler(params, { session }) {
        if (session?.userId === params.id) {
          throw new ValidationError("You cannot deactivate your own account", [
            { field: "id", message: "You cannot deactivate your own account" },
          ]);
        }
        return { user: deactivateUser(params.id) };
      },
      audit: { action: "deactivate", resourceType: "user", resourceId: (p) => p.id },
    });

    api.registerGatewayMethod("users.reactivate", {
      permission: manage,
      params: ById,
      handler(params) {
        return { user: reactivateUser(params.id) };
      },
      audit: { action: "reactivate", resourceType: "user", resourceId: (p) => p.id },
    });

    api.registerGatewayMethod("users.resetPassword", {
      permission: manage,
      params: Type.Object({ id: Id, newPassword: Type.String() }),
      async handler(params) {
        await changePassword(params.id, params.newPassword);
        return { userId: params.id, reset: true };
      },
      audit: { action: "reset_password", resourceType: "user", resourceId: (p) => p.id },
    });

    api.logger.info(
      "User Administration plugin registered (RPC: users.list, users.create, users.update, users.setRole, users.deactivate, users.reactivate, users.resetPassword)",
    );
  },
};

export default usersPlugin;
