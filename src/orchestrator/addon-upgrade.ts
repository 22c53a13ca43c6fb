/**
 * Addon Upgrade Orchestrator
 *
 * Per addon: resolve the target version, read the live version, skip when
 * already current and ready, strip oversized CRD metadata for the
 * networking plugin, apply, wait for readiness, and re-read the version.
 * With `all`, one addon's failure does not stop the others.
 */

import {
  annotationSize,
  asPods,
  imageTag,
  isPodReady,
  type Pod,
} from '../adapters/kube-resources.js';
import type { ApplyStrategy, ControlPlaneAdapter } from '../adapters/types.js';
import {
  ALL_ADDONS,
  LAST_APPLIED_ANNOTATION,
  isAddonName,
  resolveSelection,
  sameVersion,
  type AddonDefinition,
  type AddonSelection,
} from '../addons/catalog.js';
import type { RecoveryLog } from '../recovery/recovery-log.js';
import { TimeoutError, ValidationError, toError } from '../types/errors.js';
import type { WorkspaceContext } from '../types/workspace.js';
import { createLogger } from '../utils/logger.js';

const log = createLogger('addon-upgrade');

/** Server-side apply with conflict takeover is available from this minor */
const SERVER_SIDE_APPLY_MIN_MINOR = 22;

export const AddonOutcome = {
  ALREADY_CURRENT: 'already-current',
  INSTALLED: 'installed',
  UPGRADED: 'upgraded',
  FAILED: 'failed',
} as const;

export type AddonOutcome = (typeof AddonOutcome)[keyof typeof AddonOutcome];

export interface AddonReport {
  addon: string;
  targetVersion: string;
  beforeVersion: string | null;
  afterVersion: string | null;
  outcome: AddonOutcome;
  /** CRDs whose last-applied annotation was removed */
  strippedCrds: string[];
  warnings: string[];
  error?: string;
}

export interface AddonUpgradeSummary {
  reports: AddonReport[];
  failed: number;
}

export interface LiveAddonState {
  version: string | null;
  ready: boolean;
}

export interface AddonUpgradeOptions {
  readyTimeoutMs: number;
  pollIntervalMs: number;
  annotationLimitBytes: number;
}

export interface AddonUpgradeDeps {
  controlPlane: ControlPlaneAdapter;
  recovery: RecoveryLog;
}

/**
 * Parse an operator-supplied addon name.
 */
export function parseAddonSelection(value: string): AddonSelection {
  if (value === ALL_ADDONS || isAddonName(value)) {
    return value;
  }
  throw new ValidationError(`Unknown addon '${value}'`, 'addon', 'cpc upgrade-addons --list');
}

function podImage(pod: Pod, container?: string): string | undefined {
  const containers = pod.spec.containers;
  const match = container ? containers.find(c => c.name === container) : undefined;
  return (match ?? containers[0])?.image;
}

export class AddonUpgradeOrchestrator {
  private strategy: ApplyStrategy | null = null;

  constructor(
    private readonly deps: AddonUpgradeDeps,
    private readonly options: AddonUpgradeOptions
  ) {}

  /**
   * Explicit request, then the workspace pin, then the catalog default.
   */
  resolveTarget(
    definition: AddonDefinition,
    context: WorkspaceContext,
    requested?: string
  ): string {
    return requested ?? context.versions[definition.versionKey] ?? definition.defaultVersion;
  }

  /**
   * Image tag of a representative pod; null when the addon is not installed.
   */
  async liveState(definition: AddonDefinition): Promise<LiveAddonState> {
    const pods = asPods(
      await this.deps.controlPlane.query({
        resource: 'pods',
        namespace: definition.namespace,
        labelSelector: definition.podSelector,
      })
    );
    const first = pods[0];
    if (!first) {
      return { version: null, ready: false };
    }
    const image = podImage(first, definition.container);
    return {
      version: image ? imageTag(image) : null,
      ready: pods.every(isPodReady),
    };
  }

  async upgrade(
    context: WorkspaceContext,
    selection: AddonSelection,
    requestedVersion?: string
  ): Promise<AddonUpgradeSummary> {
    if (selection === ALL_ADDONS && requestedVersion !== undefined) {
      throw new ValidationError(
        'A version can only be requested for a single addon',
        'version',
        'cpc upgrade-addons <addon> <version>'
      );
    }

    const reports: AddonReport[] = [];
    for (const definition of resolveSelection(selection)) {
      const target = this.resolveTarget(definition, context, requestedVersion);
      reports.push(await this.upgradeOne(definition, target));
    }

    const failed = reports.filter(report => report.outcome === AddonOutcome.FAILED).length;
    log.info({ workspace: context.name, addons: reports.length, failed }, 'Addon upgrade finished');
    return { reports, failed };
  }

  private async upgradeOne(definition: AddonDefinition, target: string): Promise<AddonReport> {
    const report: AddonReport = {
      addon: definition.name,
      targetVersion: target,
      beforeVersion: null,
      afterVersion: null,
      outcome: AddonOutcome.FAILED,
      strippedCrds: [],
      warnings: [],
    };

    try {
      const before = await this.liveState(definition);
      report.beforeVersion = before.version;

      if (before.version !== null && sameVersion(before.version, target) && before.ready) {
        log.info({ addon: definition.name, version: target }, 'Addon already current');
        report.afterVersion = before.version;
        report.outcome = AddonOutcome.ALREADY_CURRENT;
        return report;
      }

      if (definition.crds) {
        report.strippedCrds = await this.stripOversizedAnnotations(definition.crds);
      }

      const applied = await this.deps.recovery.executeWithRecovery({
        name: `addon_${definition.name}`,
        action: () => this.applyAddon(definition, target),
        onFailureHint: `Applying ${definition.name} ${target} failed; re-run 'cpc upgrade-addons ${definition.name} ${target}' once the cause is fixed`,
      });
      if (!applied) {
        report.error = this.deps.recovery.lastFailure()?.error?.message ?? 'apply failed';
        return report;
      }

      await this.waitForReady(definition, target, report);

      const after = await this.liveState(definition);
      report.afterVersion = after.version;
      report.outcome = before.version === null ? AddonOutcome.INSTALLED : AddonOutcome.UPGRADED;
      if (after.version !== null && !sameVersion(after.version, target)) {
        report.warnings.push(
          `${definition.name} reports ${after.version} after applying ${target}`
        );
      }
    } catch (error) {
      report.outcome = AddonOutcome.FAILED;
      report.error = toError(error).message;
      log.error({ addon: definition.name, error: report.error }, 'Addon upgrade failed');
    }
    return report;
  }

  private async applyAddon(definition: AddonDefinition, version: string): Promise<void> {
    const { install } = definition;
    const { controlPlane } = this.deps;

    if (install.kind === 'image') {
      await controlPlane.apply({
        kind: 'set-image',
        namespace: install.namespace,
        workload: install.workload,
        container: install.container,
        image: install.image(version),
      });
      return;
    }

    if (install.namespace) {
      await controlPlane.apply({ kind: 'create-namespace', name: install.namespace });
    }
    const strategy = await this.applyStrategy();
    for (const source of install.manifests(version)) {
      await controlPlane.apply({
        kind: 'manifest',
        source,
        strategy,
        namespace: install.namespace,
      });
    }
  }

  /**
   * Remove the last-applied annotation from CRDs where it exceeds the
   * configured limit; otherwise the next apply is rejected for size.
   */
  private async stripOversizedAnnotations(crds: readonly string[]): Promise<string[]> {
    const stripped: string[] = [];
    for (const name of crds) {
      const [crd] = await this.deps.controlPlane.query({ resource: 'crd', name });
      if (!crd) {
        continue;
      }
      const size = annotationSize(crd, LAST_APPLIED_ANNOTATION);
      if (size <= this.options.annotationLimitBytes) {
        continue;
      }
      log.warn(
        { crd: name, sizeBytes: size, limitBytes: this.options.annotationLimitBytes },
        'Stripping oversized last-applied annotation'
      );
      await this.deps.controlPlane.apply({
        kind: 'remove-annotation',
        resource: 'crd',
        name,
        annotation: LAST_APPLIED_ANNOTATION,
      });
      stripped.push(name);
    }
    return stripped;
  }

  private async applyStrategy(): Promise<ApplyStrategy> {
    if (this.strategy) {
      return this.strategy;
    }
    const version = await this.deps.controlPlane.serverVersion();
    this.strategy =
      version !== null &&
      (version.major > 1 || version.minor >= SERVER_SIDE_APPLY_MIN_MINOR)
        ? 'server-side'
        : 'client-side';
    log.debug({ serverVersion: version?.gitVersion, strategy: this.strategy }, 'Apply strategy');
    return this.strategy;
  }

  private async waitForReady(
    definition: AddonDefinition,
    target: string,
    report: AddonReport
  ): Promise<void> {
    try {
      await this.deps.controlPlane.waitUntil(
        {
          resource: 'pods',
          namespace: definition.namespace,
          labelSelector: definition.podSelector,
        },
        objects => {
          const pods = asPods(objects);
          return (
            pods.length > 0 &&
            pods.every(isPodReady) &&
            pods.some(pod => {
              const image = podImage(pod, definition.container);
              return image !== undefined && sameVersion(imageTag(image), target);
            })
          );
        },
        {
          timeoutMs: this.options.readyTimeoutMs,
          pollIntervalMs: this.options.pollIntervalMs,
          description: `${definition.name} pods to become ready`,
        }
      );
    } catch (error) {
      if (!(error instanceof TimeoutError)) {
        throw error;
      }
      log.warn({ addon: definition.name }, error.message);
      report.warnings.push(error.message);
    }
  }
}
