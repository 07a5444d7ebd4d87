/**
 * User input validation
 */

export type InputResult<T> = { ok: true; value: T } | { ok: false; message: string };

export const DEFAULT_YEARS_BACK = 5;

const INTEGER_PATTERN = /^[+-]?\d+$/;

function parseInteger(raw: string): number | null {
  const text = raw.trim();
  return INTEGER_PATTERN.test(text) ? parseInt(text, 10) : null;
}

/**
 * Look-back window in years; blank input means the default
 */
export function parseYearsInput(
  raw: string,
  defaultYears: number = DEFAULT_YEARS_BACK
): InputResult<number> {
  if (raw.trim() === '') {
    return { ok: true, value: defaultYears };
  }

  const years = parseInteger(raw);
  if (years === null) {
    return { ok: false, message: 'Invalid input. Please enter a number.' };
  }
  if (years <= 0) {
    return { ok: false, message: 'Please enter a positive number.' };
  }

  return { ok: true, value: years };
}

export function parseMonthInput(raw: string): InputResult<number> {
  const month = parseInteger(raw);
  if (month === null) {
    return { ok: false, message: 'Invalid input. Please enter a number.' };
  }
  if (month < 1 || month > 12) {
    return { ok: false, message: 'Please enter a number between 1 and 12.' };
  }

  return { ok: true, value: month };
}

export function parseYesNo(raw: string): boolean {
  const answer = raw.trim().toLowerCase();
  return answer === 'y' || answer === 'yes';
}

export interface CliArgs {
  years?: number;
  month?: number;
  /** undefined means ask */
  save?: boolean;
  outDir?: string;
  errors: string[];
}

/**
 * Parse `--years <n> --month <n> --save|--no-save --out <dir>`.
 * Bad values are reported in `errors` and left unset so the caller can prompt.
 */
export function parseArgs(argv: readonly string[]): CliArgs {
  const args: CliArgs = { errors: [] };

  for (let i = 0; i < argv.length; i++) {
    const flag = argv[i];

    switch (flag) {
      case '--years': {
        const value = argv[++i];
        const result: InputResult<number> =
          value === undefined ? { ok: false, message: 'Missing value.' } : parseYearsInput(value);
        if (result.ok) {
          args.years = result.value;
        } else {
          args.errors.push(`--years: ${result.message}`);
        }
        break;
      }
      case '--month': {
        const value = argv[++i];
        const result: InputResult<number> =
          value === undefined ? { ok: false, message: 'Missing value.' } : parseMonthInput(value);
        if (result.ok) {
          args.month = result.value;
        } else {
          args.errors.push(`--month: ${result.message}`);
        }
        break;
      }
      case '--save':
        args.save = true;
        break;
      case '--no-save':
        args.save = false;
        break;
      case '--out': {
        const dir = argv[++i];
        if (dir) {
          args.outDir = dir;
        } else {
          args.errors.push('--out: Missing value.');
        }
        break;
      }
      default:
        args.errors.push(`Unknown argument: ${flag}`);
    }
  }

  return args;
}
