/**
 * Validator
 *
 * Runs every rule over a Program and reports all violations as one batch.
 *
 * @module
 */

import type { Program } from "../program/index.js";
import type { ValidationError } from "../source/index.js";
import type { Result } from "../../types/result.js";
import { ok, err } from "../../types/result.js";
import { DEFAULT_VALIDATION_RULES, type ValidationRule } from "./rules.js";

export function validate(
  program: Program,
  baseFragmentNames: ReadonlySet<string>,
  rules: readonly ValidationRule[] = DEFAULT_VALIDATION_RULES
): Result<void, ValidationError[]> {
  const errors = rules.flatMap((rule) => rule.validate(program, { baseFragmentNames }));
  return errors.length > 0 ? err(errors) : ok(undefined);
}
