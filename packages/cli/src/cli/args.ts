import { ConfigurationError } from '@storagecheck/checks';
import { CheckOptions } from '@storagecheck/shared';
import type { ZodError } from 'zod';

type ValueOption =
  | 'host'
  | 'user'
  | 'password'
  | 'timeout'
  | 'apiRelease'
  | 'vihost'
  | 'mode'
  | 'maintenanceState';

type ListOption = 'allowed' | 'banned';

const VALUE_FLAGS = new Map<string, ValueOption>([
  ['--host', 'host'],
  ['-s', 'host'],
  ['--user', 'user'],
  ['-u', 'user'],
  ['--password', 'password'],
  ['-p', 'password'],
  ['--timeout', 'timeout'],
  ['--api-release', 'apiRelease'],
  ['--vihost', 'vihost'],
  ['--mode', 'mode'],
  ['--maintenance-state', 'maintenanceState'],
]);

const LIST_FLAGS = new Map<string, ListOption>([
  ['--allowed', 'allowed'],
  ['-a', 'allowed'],
  ['--banned', 'banned'],
  ['-b', 'banned'],
]);

/** Flag each CheckOptions field comes from, for error messages */
const OPTION_FLAGS: Record<string, string> = {
  host: '--vihost',
  mode: '--mode',
  maintenanceState: '--maintenance-state',
  allowed: '--allowed',
  banned: '--banned',
};

export interface ParsedArgs {
  help: boolean;
  version: boolean;
  nossl: boolean;
  values: Partial<Record<ValueOption, string>>;
  allowed: string[];
  banned: string[];
}

/**
 * Parses the command line. Accepts `--flag value` and `--flag=value`;
 * `--allowed` and `--banned` may be repeated.
 */
export function parseArgs(argv: readonly string[]): ParsedArgs {
  const parsed: ParsedArgs = {
    help: false,
    version: false,
    nossl: false,
    values: {},
    allowed: [],
    banned: [],
  };

  for (let i = 0; i < argv.length; i++) {
    const token = argv[i] ?? '';
    const eq = token.startsWith('--') ? token.indexOf('=') : -1;
    const flag = eq === -1 ? token : token.slice(0, eq);
    const inline = eq === -1 ? undefined : token.slice(eq + 1);

    const takeValue = (): string => {
      if (inline !== undefined) return inline;
      const value = argv[i + 1];
      if (value === undefined) {
        throw new ConfigurationError(`${flag} requires a value`);
      }
      i++;
      return value;
    };

    const valueOption = VALUE_FLAGS.get(flag);
    const listOption = LIST_FLAGS.get(flag);
    if (valueOption) {
      parsed.values[valueOption] = takeValue();
    } else if (listOption) {
      parsed[listOption].push(takeValue());
    } else if (flag === '--nossl') {
      parsed.nossl = true;
    } else if (flag === '--help' || flag === '-h') {
      parsed.help = true;
    } else if (flag === '--version' || flag === '-V') {
      parsed.version = true;
    } else {
      throw new ConfigurationError(`unknown argument: ${token}`);
    }
  }

  return parsed;
}

function describeIssues(error: ZodError): string {
  return error.issues
    .map((issue) => {
      const field = String(issue.path[0] ?? '');
      return `${OPTION_FLAGS[field] ?? field}: ${issue.message}`;
    })
    .join('; ');
}

/** Validates the check-related arguments into CheckOptions */
export function toCheckOptions(args: ParsedArgs): CheckOptions {
  const result = CheckOptions.safeParse({
    host: args.values.vihost,
    mode: args.values.mode,
    maintenanceState: args.values.maintenanceState,
    allowed: args.allowed,
    banned: args.banned,
  });
  if (!result.success) {
    throw new ConfigurationError(describeIssues(result.error));
  }
  return result.data;
}

export const USAGE = [
  'Usage: check-host-storage --vihost <name> --mode adapter|lun [options]',
  '',
  'Connection:',
  '  -s, --host <host>           vCenter host or URL (env VSPHERE_HOST)',
  '  -u, --user <user>           vCenter user (env VSPHERE_USER)',
  '  -p, --password <password>   vCenter password (env VSPHERE_PASS)',
  '      --nossl                 Do not verify the TLS certificate (env VSPHERE_NOSSL=true)',
  '      --timeout <seconds>     Per-request timeout (default 30)',
  '      --api-release <rel>     VI/JSON release segment (default 8.0.1.0)',
  '',
  'Check:',
  '      --vihost <name>         ESXi host name as shown in the inventory',
  '      --mode <mode>           adapter | lun',
  '      --maintenance-state <s> OK | WARNING | CRITICAL | UNKNOWN (default UNKNOWN)',
  '  -a, --allowed <regex>       Only report items matching (repeatable)',
  '  -b, --banned <regex>        Never report items matching (repeatable)',
  '',
  '  -h, --help                  Show this help',
  '  -V, --version               Show the version',
].join('\n');
