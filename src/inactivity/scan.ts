// Copyright (c) Microsoft Corporation.
// Licensed under the MIT License.

// ─── Inactivity Scan ───
// Sequential run over all distribution groups: one group is fetched, fused,
// classified and (maybe) accumulated before the next begins.

import { mkdir, writeFile } from "node:fs/promises";
import { join } from "node:path";
import type { ScanOptions } from "../config.js";
import { logLine } from "../logger.js";
import { renderNarrative } from "../report/html.js";
import { renderTable } from "../report/table.js";
import { domainOf, fileTimestamp, matchesWildcard } from "../utils.js";
import { accumulate, createAggregate, recordSkipped, type AccumulateOutcome } from "./aggregate.js";
import { inactivityThreshold, traceWindow } from "./classifier.js";
import { fuse } from "./fusion.js";
import type {
  GroupListing,
  GroupSignalSource,
  OwnerLookup,
  RawSignalBundle,
  ReportAggregate,
  TraceWindow,
} from "./types.js";

export interface ScanObserver {
  progress(index: number, total: number, group: GroupListing): void;
  warning(group: GroupListing, message: string): void;
  classified(group: GroupListing, outcome: AccumulateOutcome): void;
}

const COMPONENT = "GroupScan";

export const stderrObserver: ScanObserver = {
  progress(index, total, group) {
    logLine(COMPONENT, `Processing ${index} of ${total}: ${group.displayName}`);
  },
  warning(group, message) {
    logLine(COMPONENT, `WARNING ${group.primaryAddress}: ${message}`);
  },
  classified(group, outcome) {
    if (outcome !== "active") logLine(COMPONENT, `${group.primaryAddress}: ${outcome}`);
  },
};

export interface ScanRun {
  aggregate: ReportAggregate;
  /** Groups returned by the service before filtering. */
  discovered: number;
  warnings: string[];
}

export function selectGroups(
  groups: readonly GroupListing[],
  options: Pick<ScanOptions, "nameFilter" | "domains">,
): GroupListing[] {
  const domains = options.domains?.map((d) => d.toLowerCase().replace(/^@/, ""));
  return groups.filter((g) => {
    if (options.nameFilter && !matchesWildcard(g.displayName, options.nameFilter)) return false;
    if (domains && domains.length > 0 && !domains.includes(domainOf(g.primaryAddress))) return false;
    return true;
  });
}

async function resolveOwnerList(
  source: GroupSignalSource,
  id: string,
): Promise<RawSignalBundle["owners"]> {
  const owners = await source.fetchOwners(id);
  if (!owners.ok) return owners;
  const lookups: OwnerLookup[] = [];
  for (const rawIdentifier of owners.value) {
    lookups.push({ rawIdentifier, resolution: await source.resolveIdentifier(rawIdentifier) });
  }
  return { ok: true, value: lookups };
}

export async function collectSignals(
  source: GroupSignalSource,
  group: GroupListing,
  address: string,
  window: TraceWindow,
): Promise<RawSignalBundle> {
  return {
    folderStats: await source.fetchFolderStats(group.id),
    members: await source.fetchMembers(group.id),
    owners: await resolveOwnerList(source, group.id),
    inboundTrace: await source.fetchTrace(address, "inbound", window),
    outboundTrace: await source.fetchTrace(address, "outbound", window),
  };
}

function signalWarnings(bundle: RawSignalBundle): string[] {
  const warnings: string[] = [];
  if (!bundle.folderStats.ok) warnings.push(`folder statistics unavailable (${bundle.folderStats.error.message})`);
  if (!bundle.members.ok) warnings.push(`member lookup failed (${bundle.members.error.message})`);
  if (!bundle.owners.ok) {
    warnings.push(`owner lookup failed (${bundle.owners.error.message})`);
  } else {
    for (const o of bundle.owners.value) {
      if (!o.resolution.ok) warnings.push(`owner ${o.rawIdentifier} unresolved (${o.resolution.error.message})`);
    }
  }
  if (!bundle.inboundTrace.ok) warnings.push(`inbound trace failed (${bundle.inboundTrace.error.message})`);
  if (!bundle.outboundTrace.ok) warnings.push(`outbound trace failed (${bundle.outboundTrace.error.message})`);
  return warnings;
}

/**
 * Scan every selected group. Per-signal failures become warnings and
 * sentinels; a failed attribute fetch skips the group; a ConnectionError
 * from the source aborts the run.
 */
export async function runInactivityScan(
  source: GroupSignalSource,
  options: Pick<ScanOptions, "inactivityDays" | "traceWindowDays" | "nameFilter" | "domains">,
  now: Date,
  observer: ScanObserver = stderrObserver,
): Promise<ScanRun> {
  const window = traceWindow(now, options.traceWindowDays);
  const aggregate = createAggregate(
    options.inactivityDays,
    inactivityThreshold(now, options.inactivityDays),
    window,
  );
  const warnings: string[] = [];

  const discovered = await source.listGroups();
  const groups = selectGroups(discovered, options);

  for (let i = 0; i < groups.length; i++) {
    const group = groups[i];
    observer.progress(i + 1, groups.length, group);

    const attributes = await source.fetchAttributes(group.id);
    if (!attributes.ok) {
      const label = group.primaryAddress.trim() || group.id;
      recordSkipped(aggregate, label, attributes.error.message);
      observer.warning(group, `skipped: ${attributes.error.message}`);
      warnings.push(`${label}: skipped: ${attributes.error.message}`);
      continue;
    }

    const bundle = await collectSignals(source, group, attributes.value.primaryAddress, window);
    for (const w of signalWarnings(bundle)) {
      observer.warning(group, w);
      warnings.push(`${group.primaryAddress}: ${w}`);
    }

    const outcome = accumulate(aggregate, fuse(attributes.value, bundle));
    observer.classified(group, outcome);
  }

  return { aggregate, discovered: discovered.length, warnings };
}

// ─── Artifacts ───

export interface ReportPaths {
  csvPath: string;
  htmlPath: string;
}

export async function writeScanReports(
  aggregate: ReportAggregate,
  outputDir: string,
  now: Date,
): Promise<ReportPaths> {
  await mkdir(outputDir, { recursive: true });
  const base = `InactiveDistributionGroups_${fileTimestamp(now)}`;
  const csvPath = join(outputDir, `${base}.csv`);
  const htmlPath = join(outputDir, `${base}.html`);
  await writeFile(csvPath, renderTable(aggregate), "utf8");
  await writeFile(htmlPath, renderNarrative(aggregate, now), "utf8");
  return { csvPath, htmlPath };
}
