import { Command } from 'commander';
import { ADDON_CATALOG, ADDON_NAMES, ALL_ADDONS } from '../../addons/catalog.js';
import { AddonOutcome, parseAddonSelection } from '../../orchestrator/addon-upgrade.js';
import { FatalError } from '../../types/errors.js';
import { createAddonUpgrade, type CpcRuntime, type RuntimeProvider } from '../runtime.js';
import {
  failCommand,
  formatAddonReports,
  formatJson,
  formatTable,
  print,
  printWarnings,
} from '../formatter.js';

interface UpgradeAddonsOptions {
  list?: boolean;
  json?: boolean;
}

/**
 * Create the upgrade-addons command.
 */
export function createUpgradeAddonsCommand(getRuntime: RuntimeProvider): Command {
  return new Command('upgrade-addons')
    .description('Install or upgrade cluster addons')
    .argument('[addon]', `Addon name or "${ALL_ADDONS}"`, ALL_ADDONS)
    .argument('[version]', 'Target version (single addon only)')
    .option('-l, --list', 'List supported addons and default versions', false)
    .option('-j, --json', 'Output result as JSON', false)
    .action(async (addon: string, version: string | undefined, options: UpgradeAddonsOptions) => {
      try {
        await executeUpgradeAddons(getRuntime(), addon, version, options);
      } catch (error) {
        failCommand(error);
      }
    });
}

async function executeUpgradeAddons(
  runtime: CpcRuntime,
  addon: string,
  version: string | undefined,
  options: UpgradeAddonsOptions
): Promise<void> {
  if (options.list) {
    print(
      formatTable(
        ADDON_NAMES.map(name => ADDON_CATALOG[name]),
        [
          { header: 'ADDON', width: 30, value: a => a.name },
          { header: 'DEFAULT', width: 10, value: a => a.defaultVersion },
          { header: 'PIN', width: 38, value: a => a.versionKey },
        ]
      )
    );
    return;
  }

  const selection = parseAddonSelection(addon);
  const context = await runtime.activeContext();
  const summary = await createAddonUpgrade(runtime).upgrade(context, selection, version);

  printWarnings(summary.reports.flatMap(report => report.warnings.map(w => `${report.addon}: ${w}`)));
  if (options.json) {
    print(formatJson(summary));
  } else {
    print(formatAddonReports(summary.reports));
  }

  const failed = summary.reports.filter(report => report.outcome === AddonOutcome.FAILED);
  if (failed.length > 0) {
    throw new FatalError(
      `${failed.length} addon(s) failed: ${failed.map(report => `${report.addon} (${report.error ?? 'unknown error'})`).join(', ')}`,
      `cpc upgrade-addons ${failed[0]?.addon ?? ALL_ADDONS}`
    );
  }
}
