/**
 * cpc Configuration Module
 *
 * Centralizes all configuration reading from environment variables
 * with validation and defaults.
 */

import { homedir, tmpdir } from 'node:os';
import { join } from 'node:path';
import { z } from 'zod';
import { createLogger } from '../utils/logger.js';

const log = createLogger('config');

/**
 * External tool binaries
 */
const binariesSchema = z.object({
  tofu: z.string().min(1).default('tofu'),
  ansible: z.string().min(1).default('ansible'),
  ansiblePlaybook: z.string().min(1).default('ansible-playbook'),
  kubectl: z.string().min(1).default('kubectl'),
  ssh: z.string().min(1).default('ssh'),
});

/**
 * Timeouts, all in seconds
 */
const timeoutsSchema = z.object({
  command: z.coerce.number().int().min(1).max(86400).default(300),
  infra: z.coerce.number().int().min(60).max(86400).default(3600),
  playbook: z.coerce.number().int().min(60).max(86400).default(1800),
  kubectl: z.coerce.number().int().min(5).max(3600).default(120),
  controlPlaneInit: z.coerce.number().int().min(10).max(3600).default(300),
  addonReady: z.coerce.number().int().min(10).max(3600).default(300),
  pollInterval: z.coerce.number().int().min(1).max(300).default(10),
});

const retrySchema = z.object({
  maxAttempts: z.coerce.number().int().min(1).max(20).default(3),
  backoffMs: z.coerce.number().int().min(0).max(600000).default(2000),
  backoff: z.enum(['fixed', 'linear']).default('linear'),
  maxBackoffMs: z.coerce.number().int().min(0).max(600000).default(60000),
});

/**
 * Status cache lifetimes, in seconds
 */
const statusSchema = z.object({
  sshCacheTtl: z.coerce.number().int().min(0).max(3600).default(10),
  infraCacheTtl: z.coerce.number().int().min(0).max(86400).default(300),
});

/**
 * Configuration schema with validation
 */
const configSchema = z.object({
  // Paths
  repoPath: z.string().min(1).default(process.cwd()),
  configDir: z.string().min(1).default(join(homedir(), '.config', 'cpc')),
  cacheDir: z.string().min(1).default(join(tmpdir(), 'cpc')),
  kubeconfigPath: z.string().min(1).default(join(homedir(), '.kube', 'config')),

  sshUser: z.string().min(1).default('root'),

  // Networking plugin CRD metadata above this size is stripped before apply
  crdAnnotationLimitBytes: z.coerce.number().int().min(1024).max(1048576).default(200000),

  // Substring identifying serving certificate signing requests
  csrPattern: z.string().min(1).default('kubelet-serving'),

  binaries: binariesSchema,
  timeouts: timeoutsSchema,
  retry: retrySchema,
  status: statusSchema,
});

export type CpcConfig = z.infer<typeof configSchema>;
export type RetryConfig = z.infer<typeof retrySchema>;

/**
 * Load configuration from environment variables
 */
export function loadConfig(env: NodeJS.ProcessEnv = process.env): CpcConfig {
  const raw = {
    repoPath: env.CPC_REPO_PATH,
    configDir: env.CPC_CONFIG_DIR,
    cacheDir: env.CPC_CACHE_DIR,
    kubeconfigPath: env.KUBECONFIG,
    sshUser: env.CPC_SSH_USER,
    crdAnnotationLimitBytes: env.CPC_CRD_ANNOTATION_LIMIT_BYTES,
    csrPattern: env.CPC_CSR_PATTERN,
    binaries: {
      tofu: env.CPC_TOFU_BIN,
      ansible: env.CPC_ANSIBLE_BIN,
      ansiblePlaybook: env.CPC_ANSIBLE_PLAYBOOK_BIN,
      kubectl: env.CPC_KUBECTL_BIN,
      ssh: env.CPC_SSH_BIN,
    },
    timeouts: {
      command: env.CPC_COMMAND_TIMEOUT,
      infra: env.CPC_INFRA_TIMEOUT,
      playbook: env.CPC_PLAYBOOK_TIMEOUT,
      kubectl: env.CPC_KUBECTL_TIMEOUT,
      controlPlaneInit: env.CPC_CONTROL_PLANE_INIT_TIMEOUT,
      addonReady: env.CPC_ADDON_READY_TIMEOUT,
      pollInterval: env.CPC_POLL_INTERVAL,
    },
    retry: {
      maxAttempts: env.CPC_RETRY_MAX_ATTEMPTS,
      backoffMs: env.CPC_RETRY_BACKOFF_MS,
      backoff: env.CPC_RETRY_BACKOFF,
      maxBackoffMs: env.CPC_RETRY_MAX_BACKOFF_MS,
    },
    status: {
      sshCacheTtl: env.CPC_STATUS_SSH_TTL,
      infraCacheTtl: env.CPC_STATUS_INFRA_TTL,
    },
  };

  const result = configSchema.safeParse(raw);

  if (!result.success) {
    log.error({ errors: result.error.errors }, 'Invalid configuration');
    const details = result.error.errors
      .map(issue => `${issue.path.join('.')}: ${issue.message}`)
      .join('; ');
    throw new Error(`Configuration validation failed: ${details}`);
  }

  log.debug(
    {
      repoPath: result.data.repoPath,
      cacheDir: result.data.cacheDir,
      retryMaxAttempts: result.data.retry.maxAttempts,
      crdAnnotationLimitBytes: result.data.crdAnnotationLimitBytes,
    },
    'Configuration loaded'
  );

  return result.data;
}

/**
 * Singleton configuration instance
 */
let configInstance: CpcConfig | null = null;

/**
 * Get the configuration singleton
 */
export function getConfig(): CpcConfig {
  if (!configInstance) {
    configInstance = loadConfig();
  }
  return configInstance;
}

/**
 * Reset configuration (for testing)
 */
export function resetConfig(): void {
  configInstance = null;
}
