/**
 * Application configuration from environment variables
 *
 * Usage:
 *   import { config } from '@/lib/config';
 *   if (config.animation.disabled) { ... }
 */

interface AppConfig {
  /** One of debug | info | warn | error | silent */
  logLevel: string;
  animation: {
    /** Collapse every timed operation to zero duration */
    disabled: boolean;
  };
}

function getEnvVar(key: string, defaultValue: string): string {
  const value = process.env[key];
  return typeof value === 'string' && value.length > 0 ? value : defaultValue;
}

function getBooleanEnvVar(key: string, defaultValue: boolean): boolean {
  const value = getEnvVar(key, defaultValue ? 'true' : 'false').toLowerCase();
  return value === 'true' || value === '1' || value === 'yes';
}

export const config: AppConfig = {
  logLevel: getEnvVar('WINDOW_LAYOUT_LOG_LEVEL', 'warn'),
  animation: {
    disabled: getBooleanEnvVar('WINDOW_LAYOUT_DISABLE_ANIMATION', false),
  },
};
