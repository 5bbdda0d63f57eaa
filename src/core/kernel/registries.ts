import type {
  GatewayMethodDefinition,
  HttpMethod,
  HttpRouteDefinition,
  ServiceDefinition,
  ServiceId,
  ServiceMap
} from './contracts.js';

function failDuplicate(kind: string, id: string): never {
  throw new Error(`${kind} already registered: ${id}`);
}

export class Registry<T extends { id: string }> {
  private readonly items = new Map<string, T>();

  constructor(private readonly kind: string) {}

  register(item: T): void {
    if (this.items.has(item.id)) {
      failDuplicate(this.kind, item.id);
    }
    this.items.set(item.id, item);
  }

  get(id: string): T | undefined {
    return this.items.get(id);
  }

  list(): T[] {
    return [...this.items.values()];
  }
}

export class GatewayMethodRegistry extends Registry<GatewayMethodDefinition> {
  constructor() { super('Gateway method'); }
}

export interface RouteMatch {
  route: HttpRouteDefinition;
  params: Record<string, string>;
}

function splitPath(path: string): string[] {
  return path.split('/').filter((segment) => segment.length > 0);
}

/** Binds `:name` segments of `pattern` against `pathname`; null when they differ. */
export function matchPath(pattern: string, pathname: string): Record<string, string> | null {
  const expected = splitPath(pattern);
  const actual = splitPath(pathname);
  if (expected.length !== actual.length) {
    return null;
  }

  const params: Record<string, string> = {};
  for (let index = 0; index < expected.length; index++) {
    const segment = expected[index];
    const value = actual[index];
    if (segment.startsWith(':')) {
      try {
        params[segment.slice(1)] = decodeURIComponent(value);
      } catch {
        return null;
      }
      continue;
    }
    if (segment !== value) {
      return null;
    }
  }
  return params;
}

export class HttpRouteRegistry {
  private readonly routes: HttpRouteDefinition[] = [];

  register(route: HttpRouteDefinition): void {
    const duplicate = this.routes.find((item) => item.method === route.method && item.path === route.path);
    if (duplicate) {
      failDuplicate('HTTP route', `${route.method}:${route.path}`);
    }
    this.routes.push(route);
  }

  /**
   * Static segments win over parameters: routes are tried with the fewest
   * `:name` segments first, so `/api/tasks/queue/status` shadows `/api/tasks/:id/...`.
   */
  match(method: string, pathname: string): RouteMatch | undefined {
    const candidates = this.routes
      .filter((route) => route.method === method)
      .sort((a, b) => paramCount(a.path) - paramCount(b.path));
    for (const route of candidates) {
      const params = matchPath(route.path, pathname);
      if (params) {
        return { route, params };
      }
    }
    return undefined;
  }

  /** Methods registered for a path, used to tell 405 from 404. */
  allowedMethods(pathname: string): HttpMethod[] {
    return this.routes
      .filter((route) => matchPath(route.path, pathname) !== null)
      .map((route) => route.method);
  }

  list(): HttpRouteDefinition[] {
    return [...this.routes];
  }
}

function paramCount(path: string): number {
  return splitPath(path).filter((segment) => segment.startsWith(':')).length;
}

export class ServiceRegistry {
  private readonly services: Partial<ServiceMap> = {};
  private readonly definitions: Array<Omit<ServiceDefinition, 'implementation'>> = [];

  register<K extends ServiceId>(service: ServiceDefinition<K>): void {
    if (this.services[service.id] !== undefined) {
      failDuplicate('Service', service.id);
    }
    this.services[service.id] = service.implementation;
    this.definitions.push({ id: service.id, pluginId: service.pluginId, description: service.description });
  }

  get<K extends ServiceId>(serviceId: K): ServiceMap[K] | undefined {
    return this.services[serviceId];
  }

  require<K extends ServiceId>(serviceId: K): ServiceMap[K] {
    const service = this.get(serviceId);
    if (service === undefined) {
      throw new Error(`Service not registered: ${serviceId}`);
    }
    return service;
  }

  list(): Array<Omit<ServiceDefinition, 'implementation'>> {
    return [...this.definitions];
  }
}
