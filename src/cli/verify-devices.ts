/**
 * labdev-verify
 * Checks every registered driver/dummy pair against the capability contract.
 *
 * Usage: labdev-verify [family] [--quiet] [--members]
 * Exit codes: 0 clean, 1 violations found, 2 unknown family or bad arguments
 *
 * The executable entry point is ./bin.ts; this module only exports main().
 */

import { createDefaultRegistry } from '../devices/catalog.js';
import { describeDriver, formatMember } from '../devices/descriptor.js';
import type { DriverRegistry } from '../devices/registry.js';
import { verifyRegistry, type VerificationReport } from '../devices/verifier.js';

export const EXIT_OK = 0;
export const EXIT_VIOLATIONS = 1;
export const EXIT_USAGE = 2;

interface CliOptions {
  family?: string;
  quiet: boolean;
  /** Also list each driver's member signatures */
  members: boolean;
}

function parseArgs(argv: readonly string[]): CliOptions | string {
  const options: CliOptions = { quiet: false, members: false };
  for (const arg of argv) {
    if (arg === '--quiet' || arg === '-q') {
      options.quiet = true;
    } else if (arg === '--members' || arg === '-m') {
      options.members = true;
    } else if (arg.startsWith('-')) {
      return `Unknown option: ${arg}`;
    } else if (options.family) {
      return `Only one family may be given, got ${options.family} and ${arg}`;
    } else {
      options.family = arg;
    }
  }
  return options;
}

function printReport(report: VerificationReport, options: CliOptions, registry: DriverRegistry): void {
  for (const v of report.violations) {
    console.error(`[Verify] ${v.driver}.${v.member} (${v.kind}): ${v.message}`);
  }
  if (options.quiet) return;

  const status = report.violations.length === 0 ? 'OK  ' : 'FAIL';
  console.log(
    `[Verify] ${status} ${report.driver} (${report.family}): ` +
    `${report.checkedMembers.length} dummy members checked`
  );
  for (const warning of report.warnings) {
    console.warn(`[Verify]      warning: ${warning}`);
  }
  if (report.skippedMembers.length > 0) {
    console.log(`[Verify]      skipped: ${report.skippedMembers.join(', ')}`);
  }

  const definition = registry.get(report.driver);
  const described = !report.violations.some(v => v.kind === 'probe-failed');
  if (options.members && definition && described) {
    for (const member of describeDriver(definition).members) {
      console.log(`[Verify]      ${formatMember(member)}`);
    }
  }
}

export async function main(
  argv: readonly string[] = process.argv.slice(2),
  registry: DriverRegistry = createDefaultRegistry()
): Promise<number> {
  const options = parseArgs(argv);
  if (typeof options === 'string') {
    console.error(options);
    console.error('Usage: labdev-verify [family] [--quiet] [--members]');
    return EXIT_USAGE;
  }

  const families = registry.getFamilies();
  if (options.family && !families.includes(options.family)) {
    console.error(`Unknown family: ${options.family}`);
    console.error(`Known families: ${families.join(', ')}`);
    return EXIT_USAGE;
  }

  const reports = await verifyRegistry(registry, { family: options.family });
  for (const report of reports) {
    printReport(report, options, registry);
  }

  const violations = reports.reduce((n, r) => n + r.violations.length, 0);
  if (!options.quiet) {
    console.log(`[Verify] ${reports.length} driver(s), ${violations} violation(s)`);
  }
  return violations === 0 ? EXIT_OK : EXIT_VIOLATIONS;
}
