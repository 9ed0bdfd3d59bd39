/**
 * CLI Commands - Public API
 */

export { executeListCommand, describeOrigin, type ListCommandDeps, type ListCommandOptions } from './list.js';
export { executeDescribeCommand, describeInput, type DescribeCommandDeps } from './describe.js';
export {
  executeEvaluateCommand,
  collectInputs,
  parseCliValue,
  type EvaluateCommandDeps,
  type EvaluateCommandOptions,
  type OutputFormat,
} from './evaluate.js';
export { executeValidateCommand, type ValidateCommandDeps } from './validate.js';
