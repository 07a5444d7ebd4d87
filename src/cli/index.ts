/**
 * CLI Module
 */

export {
  parseYearsInput,
  parseMonthInput,
  parseYesNo,
  parseArgs,
  DEFAULT_YEARS_BACK,
  type CliArgs,
  type InputResult,
} from './input.js';
export { promptUntilValid, createPrompter, type Ask, type Prompter } from './prompt.js';
