/**
 * The slice of pino's API the services use. `server.log` satisfies it, and
 * tests can pass plain `vi.fn()` stubs.
 */
export interface Logger {
    info(obj: object, msg?: string): void;
    warn(obj: object, msg?: string): void;
    error(obj: object, msg?: string): void;
}
