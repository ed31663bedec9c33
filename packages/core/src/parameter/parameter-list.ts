/**
 * Named parameter sweeps: a parameter name plus the values a command
 * template is run with, each substituted for `{name}`.
 */

import { ok, err, type Result } from 'neverthrow';
import { tokenize } from './tokenizer.js';

export class ParameterError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'ParameterError';
  }
}

export interface ParameterList {
  readonly name: string;
  readonly values: readonly string[];
}

export interface ParameterBinding {
  readonly name: string;
  readonly value: string;
}

/** A command template with one parameter value filled in. */
export interface ExpandedCommand {
  readonly command: string;
  readonly parameter: ParameterBinding;
}

/**
 * Build a parameter list from a name and a raw comma-separated value list.
 * See {@link tokenize} for the escaping rules.
 */
export function parseParameterList(
  name: string,
  rawValues: string,
): Result<ParameterList, ParameterError> {
  if (name.length === 0) {
    return err(new ParameterError('Parameter name must not be empty'));
  }
  if (name.includes('{') || name.includes('}')) {
    return err(new ParameterError(`Parameter name must not contain braces: ${name}`));
  }

  return ok({ name, values: tokenize(rawValues) });
}

/** Replace every `{name}` placeholder in the template with the value. */
export function substituteParameter(template: string, name: string, value: string): string {
  return template.split(`{${name}}`).join(value);
}

/**
 * Expand a command template once per parameter value, in list order.
 * A template without the placeholder still yields one command per value.
 */
export function expandCommands(template: string, list: ParameterList): ExpandedCommand[] {
  return list.values.map((value) => ({
    command: substituteParameter(template, list.name, value),
    parameter: { name: list.name, value },
  }));
}
