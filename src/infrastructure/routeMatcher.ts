/**
 * Route template resolution
 *
 * The metrics middleware runs before Express dispatches, so it cannot read
 * `req.route` when it opens the in-progress gauge. Instead it resolves the
 * template from the same route table the app mounts, compiled with
 * `path-to-regexp` (the matcher Express itself uses). Raw paths never become
 * labels: anything that matches no declared route is `unmatched`.
 */

import type { RequestHandler } from 'express';
import { match, type MatchFunction, type ParamData } from 'path-to-regexp';

export type HttpMethod = 'get' | 'post' | 'put' | 'patch' | 'delete';

export interface RouteDefinition {
  method: HttpMethod;
  /** Full Express path pattern, e.g. `/api/v1/users/:userId`. */
  path: string;
  handlers: RequestHandler[];
}

export const UNMATCHED_ROUTE = 'unmatched';

interface CompiledRoute {
  method: HttpMethod;
  template: string;
  matches: MatchFunction<ParamData>;
}

/** `/api/v1/users/:userId` → `/api/v1/users/{userId}` */
export function toTemplateLabel(path: string): string {
  return path.replace(/:([A-Za-z_$][\w$]*)/g, '{$1}');
}

export class RouteMatcher {
  private readonly routes: CompiledRoute[];

  constructor(definitions: readonly Pick<RouteDefinition, 'method' | 'path'>[]) {
    this.routes = definitions.map((definition) => ({
      method: definition.method,
      template: toTemplateLabel(definition.path),
      matches: match(definition.path, { decode: false }),
    }));
  }

  /**
   * Template label of the first route matching `method` and `path`, or
   * `null`. HEAD is answered by GET routes, as in Express.
   */
  resolve(method: string, path: string): string | null {
    const lowered = method.toLowerCase();
    const effective = lowered === 'head' ? 'get' : lowered;
    for (const route of this.routes) {
      if (route.method === effective && route.matches(path) !== false) {
        return route.template;
      }
    }
    return null;
  }
}
