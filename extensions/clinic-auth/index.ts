/**
 * ClinicDesk - Auth Extension Plugin
 *
 * Provides gateway methods for:
 *   auth.login            Check credentials; returns the user, role screens and permissions
 *   auth.logout           Drop the stored refresh token
 *   auth.me               Current user
 *   auth.navigation       Screens the current role may open
 *   auth.changePassword   Change own password
 *
 * The HTTP API issues tokens around auth.login; a desktop front end keeps the
 * returned user as its session.
 */

import { Type } from "@sinclair/typebox";

import { writeAuditLog } from "../../src/audit/logger.ts";
import { navigationFor, permissionsFor, ROLE_SUBTITLES } from "../../src/auth/rbac.ts";
import { AuthenticationError } from "../../src/errors.ts";
import { NoParams } from "../../src/gateway/schemas.ts";
import type { ClinicPlugin, ClinicPluginApi } from "../../src/gateway/types.ts";
import {
  authenticateUser,
  changePassword,
  getUser,
  setRefreshToken,
  verifyUserPassword,
} from "../../src/repositories/users.ts";

const clinicAuthPlugin: ClinicPlugin = {
  id: "clinic-auth",
  name: "Clinic Auth",
  description: "Staff login, lockout, session info and password changes",
  version: "1.0.0",

  register(api: ClinicPluginApi) {
    api.logger.info("Clinic Auth plugin registering...");
    const policy = {
      maxLoginAttempts: api.config.security.maxLoginAttempts,
      lockoutDurationMinutes: api.config.security.lockoutDurationMinutes,
    };

    // ── auth.login ──────────────────────────────────────────
    api.registerGatewayMethod("auth.login", {
      description: "Authenticate with username and password",
      public: true,
      params: Type.Object({
        username: Type.String({ minLength: 1 }),
        password: Type.String({ minLength: 1 }),
      }),
      async handler(params, { write }) {
        const user = await authenticateUser(params.username.trim(), params.password, policy, write);
        writeAuditLog(
          { operatorId: user.id, operatorName: user.username },
          { action: "login", resourceType: "user", resourceId: user.id },
        );
        return {
          user,
          subtitle: ROLE_SUBTITLES[user.role],
          navigation: navigationFor(user.role),
          permissions: permissionsFor(user.role),
        };
      },
    });

    // ── auth.logout ─────────────────────────────────────────
    api.registerGatewayMethod("auth.logout", {
      description: "End the session and revoke the refresh token",
      params: NoParams,
      handler(_params, { session }) {
        if (!session) throw new AuthenticationError("Authentication required");
        setRefreshToken(session.userId, null);
        return { userId: session.userId, loggedOut: true };
      },
      audit: { action: "logout", resourceType: "user", resourceId: (_params, result) => result.userId },
    });

    // ── auth.me ─────────────────────────────────────────────
    api.registerGatewayMethod("auth.me", {
      description: "The signed-in user",
      params: NoParams,
      handler(_params, { session }) {
        if (!session) throw new AuthenticationError("Authentication required");
        const user = getUser(session.userId);
        return { user, subtitle: ROLE_SUBTITLES[user.role], permissions: permissionsFor(user.role) };
      },
    });

    // ── auth.navigation ─────────────────────────────────────
    api.registerGatewayMethod("auth.navigation", {
      description: "Screens available to the signed-in role",
      params: NoParams,
      handler(_params, { session }) {
        if (!session) throw new AuthenticationError("Authentication required");
        return { role: session.role, navigation: navigationFor(session.role) };
      },
    });

    // ── auth.changePassword ─────────────────────────────────
    api.registerGatewayMethod("auth.changePassword", {
      description: "Change the signed-in user's password",
      params: Type.Object({
        currentPassword: Type.String({ minLength: 1 }),
        newPassword: Type.String(),
      }),
      async handler(params, { session }) {
        if (!session) throw new AuthenticationError("Authentication required");
        if (!(await verifyUserPassword(session.userId, params.currentPassword))) {
          throw new AuthenticationError("Current password is incorrect");
        }
        await changePassword(session.userId, params.newPassword);
        return { userId: session.userId, changed: true };
      },
      audit: { action: "change_password", resourceType: "user", resourceId: (_params, result) => result.userId },
    });

    api.logger.info(
      "Clinic Auth plugin registered (RPC: auth.login, auth.logout, auth.me, auth.navigation, auth.changePassword)",
    );
  },
};

export default clinicAuthPlugin;
