/**
 * ClinicDesk - Method Gateway
 *
 * Every screen action is a named gateway method. A call is checked in this
 * order: the method exists, a session is present (unless the method is
 * public), the session's role holds the method's permission, and the params
 * match the method's typebox schema. Audited methods write one audit entry
 * after the handler succeeds.
 */

import type { TSchema } from "@sinclair/typebox";
import { Value } from "@sinclair/typebox/value";

import { writeAuditLog } from "../audit/logger.ts";
import { hasPermission, permissionKey, type PermissionCheck } from "../auth/rbac.ts";
import type { ClinicConfig } from "../config/clinic-config.ts";
import {
  AuthenticationError,
  ClinicError,
  ForbiddenError,
  NotFoundError,
  ValidationError,
  type FieldIssue,
} from "../errors.ts";
import { createLogger } from "../logger.ts";
import type { ClinicPlugin, ClinicPluginApi, MethodContext, MethodDefinition, MethodInfo, Session } from "./types.ts";

type RegisteredMethod = {
  info: MethodInfo;
  permission?: PermissionCheck;
  invoke(params: unknown, context: MethodContext): Promise<unknown>;
};

export type GatewayOptions = {
  config: ClinicConfig;
  /** Wall clock for handlers; tests pin it. */
  clock?: () => Date;
};

function schemaIssues(schema: TSchema, value: unknown): FieldIssue[] {
  return [...Value.Errors(schema, value)].map((error) => ({
    field: error.path.replace(/^\//, "").replaceAll("/", ".") || "params",
    message: error.message,
  }));
}

export class Gateway {
  private readonly methods = new Map<string, RegisteredMethod>();
  private readonly log = createLogger("gateway");
  private readonly clock: () => Date;

  constructor(private readonly options: GatewayOptions) {
    this.clock = options.clock ?? (() => new Date());
  }

  registerMethod<S extends TSchema, R>(name: string, definition: MethodDefinition<S, R>): void {
    if (this.methods.has(name)) {
      throw new Error(`[clinicdesk:gateway] Method already registered: ${name}`);
    }

    const invoke = async (params: unknown, context: MethodContext): Promise<unknown> => {
      if (!Value.Check(definition.params, params)) {
        const issues = schemaIssues(definition.params, params);
        throw new ValidationError(`Invalid parameters for ${name}`, issues);
      }
      const result = await definition.handler(params, context);

      if (definition.audit) {
        const { action, resourceType, resourceId } = definition.audit;
        writeAuditLog(
          { operatorId: context.session?.userId ?? null, operatorName: context.session?.username },
          { action, resourceType, resourceId: resourceId?.(params, result), detail: { method: name } },
        );
      }
      return result;
    };

    this.methods.set(name, {
      info: {
        name,
        description: definition.description,
        permission: definition.permission ? permissionKey(definition.permission) : undefined,
        public: definition.public ?? false,
      },
      permission: definition.permission,
      invoke,
    });
  }

  has(name: string): boolean {
    return this.methods.has(name);
  }

  listMethods(): MethodInfo[] {
    return [...this.methods.values()].map((m) => m.info).sort((a, b) => a.name.localeCompare(b.name));
  }

  /** Methods the given role may call, for building menus. */
  methodsFor(session: Session): MethodInfo[] {
    return [...this.methods.values()]
      .filter((m) => !m.permission || hasPermission(session.role, m.permission))
      .map((m) => m.info)
      .sort((a, b) => a.name.localeCompare(b.name));
  }

  async call(name: string, params: unknown, session: Session | null): Promise<unknown> {
    const method = this.methods.get(name);
    if (!method) throw new NotFoundError("Method", name);

    if (!method.info.public && !session) {
      throw new AuthenticationError("Authentication required");
    }
    if (method.permission && (!session || !hasPermission(session.role, method.permission))) {
      throw new ForbiddenError(permissionKey(method.permission));
    }

    const now = this.clock();
    const context: MethodContext = {
      session,
      write: { actorId: session?.userId ?? null, now },
      config: this.options.config,
      logger: this.log,
    };

    try {
      const result = await method.invoke(params ?? {}, context);
      this.log.debug({ method: name, userId: session?.userId }, "Gateway call succeeded");
      return result;
    } catch (err) {
      if (err instanceof ClinicError) {
        this.log.warn({ method: name, userId: session?.userId, code: err.code }, err.message);
      } else {
        this.log.error({ method: name, userId: session?.userId, err }, "Gateway call failed");
      }
      throw err;
    }
  }

  /** The API handed to a plugin's `register`. */
  pluginApi(plugin: Pick<ClinicPlugin, "id">): ClinicPluginApi {
    return {
      logger: createLogger(`plugin:${plugin.id}`),
      config: this.options.config,
      registerGatewayMethod: (name, definition) => this.registerMethod(name, definition),
    };
  }

  registerPlugins(plugins: ClinicPlugin[]): void {
    for (const plugin of plugins) {
      plugin.register(this.pluginApi(plugin));
      this.log.info({ plugin: plugin.id, version: plugin.version }, "Plugin registered");
    }
  }
}
