import { log } from '../common/logger';

export class EnvironmentUtil {
  static isProduction(): boolean {
    return process.env.NODE_ENV === 'production';
  }

  /**
   * Read a positive number from the environment, falling back when the variable
   * is missing or does not parse.
   */
  static readPositiveNumber(name: string, fallback: number): number {
    const raw = process.env[name];
    if (raw === undefined || raw.trim() === '') {
      return fallback;
    }

    const value = Number(raw);
    if (!Number.isFinite(value) || value <= 0) {
      log.warn(`Ignoring ${name}=${raw}: expected a positive number, using ${fallback}`);
      return fallback;
    }
    return value;
  }
}
