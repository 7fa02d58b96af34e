/**
 * Derived route names
 */

const NON_WORD = /[^A-Za-z0-9]+/g;

/**
 * Name for a route that declares a service but no name:
 * `<service>-<paths>-<METHODS>`, e.g. `user-service-v1-orders-GET+POST`.
 * Routes without methods end in `ANY`; routes without paths skip that part.
 */
export function defaultRouteName(service: string, paths: string[] = [], methods: string[] = []): string {
  const pathPart = paths.join('-').replace(NON_WORD, '-').replace(/^-+|-+$/g, '');
  const methodList = methods.map((method) => method.toUpperCase()).sort();
  const methodPart = methodList.length > 0 ? methodList.join('+') : 'ANY';
  return [service, pathPart, methodPart].filter((part) => part !== '').join('-');
}
