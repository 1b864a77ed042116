import { ReconcileErrorCode } from "../shared/errors.js";
import { runOrThrow, type SlaptSession } from "./runner.js";

/** One line of `slapt-get --search` output. */
export interface SearchEntry {
  /** Full package id, e.g. `iptables-1.8.4-x86_64-1`. */
  readonly id: string;
  readonly name: string;
  readonly version: string;
  readonly arch: string;
  readonly build: string;
  readonly installed: boolean;
  readonly description: string;
}

export interface QueryResult {
  readonly name: string;
  readonly installed: boolean;
  /** Matching entries, newest first. */
  readonly candidates: SearchEntry[];
}

// <name>-<version>-<arch>-<build> [inst=yes]: <description>
const SEARCH_LINE = /^((\S+)-([^\s-]+)-([^\s-]+)-([^\s-]+))\s+\[inst=(yes|no)\]:?\s*(.*)$/;

export function parseSearchOutput(text: string): SearchEntry[] {
  const entries: SearchEntry[] = [];
  for (const line of text.split(/\r?\n/)) {
    const m = SEARCH_LINE.exec(line.trim());
    if (!m) continue;
    const [, id, name, version, arch, build, inst, description] = m;
    entries.push({ id, name, version, arch, build, installed: inst === "yes", description });
  }
  return entries;
}

/** Version ordering in the spirit of `sort -V`: numeric runs compare as numbers. */
export function compareVersions(a: SearchEntry, b: SearchEntry): number {
  const opts = { numeric: true, sensitivity: "base" } as const;
  return a.version.localeCompare(b.version, "en", opts) || a.build.localeCompare(b.build, "en", opts);
}

/**
 * Report whether `name` is installed. With `latest`, only the newest available
 * version counts, so an older installed copy reports false.
 */
export function resolveInstalled(name: string, entries: readonly SearchEntry[], latest: boolean): QueryResult {
  const candidates = entries.filter((e) => e.name === name).sort((a, b) => compareVersions(b, a));
  const installed = latest
    ? candidates[0]?.installed ?? false
    : candidates.some((e) => e.installed);
  return { name, installed, candidates };
}

/**
 * slapt-get treats the search term as a POSIX regex; names such as `gtk+2`
 * or `libsigc++` must match literally, and only at the start of the id.
 */
export function searchPattern(name: string): string {
  return `^${name.replace(/[.^$*+?()[\]{}|\\]/g, "\\$&")}-`;
}

export async function queryPackage(session: SlaptSession, name: string, options?: { latest?: boolean }): Promise<QueryResult> {
  const result = await runOrThrow(session, session.commands.search(searchPattern(name)), {
    code: ReconcileErrorCode.QUERY_FAILED,
    message: `Failed to search for package ${name}`,
    package: name,
  });
  return resolveInstalled(name, parseSearchOutput(result.stdout), options?.latest ?? false);
}
