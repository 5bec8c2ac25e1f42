import type { z } from 'zod';
import { InvalidParamsError, MethodNotFoundError } from '../protocol/errors.js';

export interface RequestContext {
  method: string;
  /** Absent for notifications. */
  id?: string | number;
}

export type MethodHandler<P> = (params: P, ctx: RequestContext) => unknown | Promise<unknown>;

type Route = (params: unknown, ctx: RequestContext) => Promise<unknown>;

/**
 * Dispatcher — routing table from method name to a validated handler.
 *
 * Params are parsed with the route's zod schema before the handler runs, so
 * handlers receive typed payloads. Holds nothing but the table.
 */
export class Dispatcher {
  private readonly routes = new Map<string, Route>();

  register<S extends z.ZodTypeAny>(
    method: string,
    schema: S,
    handler: MethodHandler<z.output<S>>,
  ): void {
    this.routes.set(method, async (params, ctx) => {
      const parsed = schema.safeParse(params ?? {});
      if (!parsed.success) {
        const issue = parsed.error.issues[0];
        const where = issue && issue.path.length > 0 ? ` "${issue.path.join('.')}"` : '';
        throw new InvalidParamsError(
          `Invalid params for ${method}${where}: ${issue?.message ?? 'rejected'}`,
          { issues: parsed.error.issues },
        );
      }
      return handler(parsed.data, ctx);
    });
  }

  has(method: string): boolean {
    return this.routes.has(method);
  }

  /** Throws MethodNotFoundError for an unregistered method, InvalidParamsError for rejected params. */
  async dispatch(method: string, params: unknown, ctx: RequestContext = { method }): Promise<unknown> {
    const route = this.routes.get(method);
    if (!route) throw new MethodNotFoundError(method);
    return route(params, ctx);
  }
}
