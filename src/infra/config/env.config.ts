import { tmpdir } from 'os';

/**
 * Centralized environment configuration.
 * All env keys and defaults in one place. Works with .env (local) and plain process env.
 */

/** Image used when a provision request does not name one. */
export const DEFAULT_IMAGE_OCI = 'shajalahamedcse/only-k3-go:v1.0.10';

/** Env key constants. */
export const EnvKeys = {
  PORT: 'PORT',
  LEDGER_PATH: 'LEDGER_PATH',
  STAGING_DIR: 'STAGING_DIR',
  IGNITE_BIN: 'IGNITE_BIN',
  IGNITE_USE_SUDO: 'IGNITE_USE_SUDO',
  DEFAULT_IMAGE_OCI: 'DEFAULT_IMAGE_OCI',
} as const;

/** How the Ignite CLI is invoked. */
export interface IgniteConfig {
  binary: string;
  /** Prefix every invocation with `sudo`. */
  useSudo: boolean;
}

/** Resolved service configuration. */
export interface ProvisionApiConfig {
  port: number;
  /** Ledger CSV path; relative paths resolve against the process working directory. */
  ledgerPath: string;
  stagingDir: string;
  ignite: IgniteConfig;
  defaultImageOci: string;
}

function getEnvString(key: string, defaultValue: string): string {
  const v = process.env[key]?.trim();
  return v ? v : defaultValue;
}

function getEnvInt(key: string, defaultValue: number): number {
  const v = process.env[key];
  if (v == null || v.trim() === '') return defaultValue;
  const n = parseInt(v, 10);
  return Number.isNaN(n) ? defaultValue : n;
}

function getEnvBool(key: string, defaultValue: boolean): boolean {
  const v = process.env[key]?.toLowerCase();
  if (v == null || v === '') return defaultValue;
  return v === 'true' || v === '1';
}

/** HTTP server port. */
export function getPort(): number {
  return getEnvInt(EnvKeys.PORT, 5090);
}

export function getLedgerPath(): string {
  return getEnvString(EnvKeys.LEDGER_PATH, 'provisioned_vms.csv');
}

export function getStagingDir(): string {
  return getEnvString(EnvKeys.STAGING_DIR, tmpdir());
}

export function getIgniteConfig(): IgniteConfig {
  return {
    binary: getEnvString(EnvKeys.IGNITE_BIN, 'ignite'),
    useSudo: getEnvBool(EnvKeys.IGNITE_USE_SUDO, true),
  };
}

export function getDefaultImageOci(): string {
  return getEnvString(EnvKeys.DEFAULT_IMAGE_OCI, DEFAULT_IMAGE_OCI);
}

/** NestJS injection token for the resolved {@link ProvisionApiConfig}. */
export const PROVISION_CONFIG = 'ProvisionApiConfig' as const;

export function resolveProvisionConfig(): ProvisionApiConfig {
  return {
    port: getPort(),
    ledgerPath: getLedgerPath(),
    stagingDir: getStagingDir(),
    ignite: getIgniteConfig(),
    defaultImageOci: getDefaultImageOci(),
  };
}
