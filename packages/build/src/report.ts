/**
 * Human-readable renderings of a resolution
 */

import { table } from 'table';
import { ResolutionReport } from './types';

export type FeatureStatus = 'enabled' | 'missing' | 'not requested' | 'unknown';

export const REPORT_HEADER = ['Feature', 'Status', 'Probe', 'Detail'];

/**
 * One flag per line, indented by two spaces
 */
export function formatFlagList(flags: readonly string[]): string {
  return flags.map(flag => `  ${flag}`).join('\n');
}

/**
 * Table rows for every catalog feature the report mentions. Probed features
 * come first in catalog order, then the unrequested ones, then unknown names.
 */
export function reportRows(report: ResolutionReport): string[][] {
  const rows: string[][] = [];

  for (const result of report.probeResults) {
    const status: FeatureStatus = result.available ? 'enabled' : 'missing';
    rows.push([result.feature.name, status, `${result.strategy} ${result.target}`.trim(), result.reason]);
  }
  for (const name of report.skippedUnrequested) {
    rows.push([name, 'not requested', '-', '-']);
  }
  for (const name of report.unknownRequested) {
    rows.push([name, 'unknown', '-', 'not in the feature catalog']);
  }

  return rows;
}

export function summaryLines(report: ResolutionReport): string[] {
  const list = (names: readonly string[]) => (names.length > 0 ? names.join(', ') : '(none)');
  return [
    `Target: ${report.request.platform}/${report.request.architecture} (${report.request.buildProfile})`,
    `Enabled: ${list(report.included)}`,
    `Missing: ${list(report.skippedMissing)}`,
    `Unknown: ${list(report.unknownRequested)}`
  ];
}

/** Plain-data form of a report for `--json` output */
export interface ReportJson {
  platform: string;
  architecture: string;
  buildProfile: string;
  installPrefix: string;
  requested: string[];
  enabledFlags: string[];
  included: string[];
  skippedMissing: string[];
  skippedUnrequested: string[];
  unknownRequested: string[];
  probes: Array<{ feature: string; available: boolean; strategy: string; target: string; reason: string }>;
}

export function reportToJson(report: ResolutionReport): ReportJson {
  const { request } = report;
  return {
    platform: request.platform,
    architecture: request.architecture,
    buildProfile: request.buildProfile,
    installPrefix: request.installPrefix,
    requested: [...request.requestedFeatures],
    enabledFlags: [...report.enabledFlags],
    included: [...report.included],
    skippedMissing: [...report.skippedMissing],
    skippedUnrequested: [...report.skippedUnrequested],
    unknownRequested: [...report.unknownRequested],
    probes: report.probeResults.map(result => ({
      feature: result.feature.name,
      available: result.available,
      strategy: result.strategy,
      target: result.target,
      reason: result.reason
    }))
  };
}

export function renderReport(report: ResolutionReport): string {
  const sections = [
    summaryLines(report).join('\n'),
    table([REPORT_HEADER, ...reportRows(report)]),
    'Configuration flags:',
    formatFlagList(report.enabledFlags)
  ];
  return sections.join('\n');
}
