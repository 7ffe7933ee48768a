/**
 * Route definitions of the remote process engine, relative to the client's base URL.
 */
export const Routes = {
  /**
   * GET /contexts/:contextName/processes
   * List the processes of a business context. Filters go in the query string.
   */
  ContextProcesses: '/contexts/:contextName/processes',

  /**
   * POST /contexts/processes/:processName
   * Start a named process, or resume the caller's open instance of it.
   */
  StartOrResumeContextProcess: '/contexts/processes/:processName',

  /**
   * POST /processes/:instanceId/resume
   * Resume an existing instance.
   */
  ResumeProcess: '/processes/:instanceId/resume',

  /**
   * POST /processes/:processId/transitions/:transitionId
   * Report a completed step and receive the next state.
   */
  ContinueTransition: '/processes/:processId/transitions/:transitionId',
} as const;

export type RouteName = keyof typeof Routes;
export type RoutePath = (typeof Routes)[RouteName];

/**
 * Helper to build a route with parameters and an optional query.
 *
 * @example
 * ```typescript
 * buildRoute(Routes.ContextProcesses, { contextName: 'account' }, { status: 'active' });
 * // => '/contexts/account/processes?status=active'
 * ```
 */
export function buildRoute(
  route: RoutePath,
  params: Record<string, string> = {},
  query: Readonly<Record<string, string>> = {}
): string {
  let result: string = route;
  for (const [key, value] of Object.entries(params)) {
    result = result.replace(`:${key}`, encodeURIComponent(value));
  }
  const search = new URLSearchParams(query).toString();
  return search ? `${result}?${search}` : result;
}
