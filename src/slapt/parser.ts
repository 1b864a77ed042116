// Parser for the planning report slapt-get prints under --simulate.
// The report has no machine-readable form: a header line opens a section and the
// package names follow on lines indented by two or more spaces. Only the C locale
// wording below is recognised; anything else closes the current section.
import { emptyPlan, type ActionPlan, type PlanSection } from "../types/slapt.js";

export const PLAN_HEADERS = {
  install: "The following NEW packages will be installed:",
  upgrade: "The following packages will be upgraded:",
  remove: "The following packages will be REMOVED:",
  suggested: "Suggested packages:",
} as const;

const CONTINUATION = /^\s{2,}\S/;

/** `none` before the first header, `discard` after any line that is not a known header. */
type ParserState = PlanSection | "none" | "discard";

export interface ParseOptions {
  /** Treat "Suggested packages:" as part of the install section. */
  readonly suggested?: boolean;
}

/** Section a non-continuation line switches the parser to. */
function transition(line: string, suggested: boolean): ParserState {
  if (line.startsWith(PLAN_HEADERS.install)) return "install";
  if (line.startsWith(PLAN_HEADERS.upgrade)) return "upgrade";
  if (line.startsWith(PLAN_HEADERS.remove)) return "remove";
  if (suggested && line.startsWith(PLAN_HEADERS.suggested)) return "install";
  return "discard";
}

function isPlanSection(state: ParserState): state is PlanSection {
  return state === "install" || state === "upgrade" || state === "remove";
}

/**
 * Turn simulated output into an ActionPlan.
 * Continuation lines are checked before headers, so an indented header would be
 * read as package names; slapt-get never indents its headers.
 */
export function parsePlan(text: string, options: ParseOptions = {}): ActionPlan {
  const plan = emptyPlan();
  if (text.length === 0) return plan;

  const suggested = options.suggested ?? false;
  let state: ParserState = "none";

  for (const line of text.split(/\r?\n/)) {
    if (CONTINUATION.test(line)) {
      if (isPlanSection(state)) plan[state].push(...line.trim().split(/\s+/));
      continue;
    }
    state = transition(line, suggested);
  }

  return converge(plan);
}

/**
 * Dedupe each section and keep a name only in the first section that listed it,
 * in install → upgrade → remove order.
 */
export function converge(plan: ActionPlan): ActionPlan {
  const seen = new Set<string>();
  const claim = (names: string[]): string[] =>
    names.filter((name) => {
      if (seen.has(name)) return false;
      seen.add(name);
      return true;
    });
  return { install: claim(plan.install), upgrade: claim(plan.upgrade), remove: claim(plan.remove) };
}

export function planSize(plan: ActionPlan): number {
  return plan.install.length + plan.upgrade.length + plan.remove.length;
}
