export type ProxyService = 'valet' | 'herd';

export const PROXY_SERVICES: readonly ProxyService[] = ['valet', 'herd'];

export interface ProjectRecord {
  name: string; // normalized from the absolute project path
  path?: string; // liveness check only
  domain?: string; // "<name>.test"
  proxyService?: ProxyService;
  proxySecure?: boolean;
  ports: Record<string, number>; // "APP_PORT" -> 8000
  extra?: Record<string, string>; // unrecognized keys, kept verbatim
}

export type Registry = Map<string, ProjectRecord>;

export interface PortVariable {
  name: string; // "FORWARD_DB_PORT"
  defaultPort: number; // 3306
}

export interface PortAssignment extends PortVariable {
  startPort: number;
  port: number;
}

export interface Logger {
  info(message: string): void;
  success(message: string): void;
  warn(message: string): void;
  error(message: string): void;
}

export const silentLogger: Logger = {
  info: () => {},
  success: () => {},
  warn: () => {},
  error: () => {},
};
