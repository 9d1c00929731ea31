/**
 * Terminal prompts for rendered questions.
 *
 * Prompts are built from the question's JSON Schema alone, the same view a
 * web front end gets.
 */

import type { ValidationDetail } from '../errors.js';
import type { Question } from '../fields/question.js';
import { getOwn, isJsonObject, type JsonObject, type JsonValue } from '../utils/json.js';
import type { InputReader, OutputWriter } from './types.js';
import { paint, type DisplayOptions } from './utils/displayUtils.js';

export type PromptKind = 'text' | 'number' | 'date' | 'select' | 'multiselect';

export interface Choice {
  readonly id: string;
  readonly title: string;
}

/**
 * How one field is asked for.
 */
export interface FieldPrompt {
  readonly name: string;
  readonly title: string;
  readonly kind: PromptKind;
  readonly nullable: boolean;
  readonly defaultValue?: JsonValue;
  readonly choices: readonly Choice[];
}

function schemaTypes(schema: JsonObject): string[] {
  const type = getOwn(schema, 'type');
  if (typeof type === 'string') {
    return [type];
  }
  return Array.isArray(type) ? type.filter((item): item is string => typeof item === 'string') : [];
}

function readChoices(value: JsonValue | undefined): Choice[] {
  if (!Array.isArray(value)) {
    return [];
  }
  const choices: Choice[] = [];
  for (const entry of value) {
    if (!isJsonObject(entry)) {
      continue;
    }
    const id = getOwn(entry, 'const');
    const title = getOwn(entry, 'title');
    if (typeof id === 'string') {
      choices.push({ id, title: typeof title === 'string' ? title : id });
    }
  }
  return choices;
}

/**
 * Derives the prompt for a field from its schema.
 */
export function describeField(name: string, schema: JsonObject): FieldPrompt {
  const types = schemaTypes(schema);
  const nullable = types.includes('null');
  const title = getOwn(schema, 'title');
  const xType = getOwn(schema, 'x-type');
  const defaultValue = getOwn(schema, 'default');

  let kind: PromptKind;
  let choices: Choice[] = [];
  if (types.includes('array')) {
    kind = 'multiselect';
    const items = getOwn(schema, 'items');
    choices = readChoices(isJsonObject(items) ? getOwn(items, 'oneOf') : undefined);
  } else if (getOwn(schema, 'x-component') !== undefined) {
    kind = 'select';
    choices = readChoices(getOwn(schema, 'oneOf'));
  } else if (xType === 'date') {
    kind = 'date';
  } else if (types.includes('number') || types.includes('integer')) {
    kind = 'number';
  } else {
    kind = 'text';
  }

  return {
    name,
    title: typeof title === 'string' ? title : name,
    kind,
    nullable,
    ...(defaultValue !== undefined && { defaultValue }),
    choices,
  };
}

function choiceAt(prompt: FieldPrompt, text: string): string {
  const position = Number(text);
  const choice = Number.isInteger(position) ? prompt.choices[position - 1] : undefined;
  // Unknown positions go through as given and are rejected by validation.
  return choice?.id ?? text;
}

/**
 * Converts typed input into a response value. `undefined` leaves the field
 * out of the responses.
 *
 * @param prompt - The field being answered.
 * @param raw - The line typed.
 */
export function parseAnswer(prompt: FieldPrompt, raw: string): JsonValue | undefined {
  const text = raw.trim();
  if (text === '') {
    if (prompt.defaultValue !== undefined) {
      return prompt.defaultValue;
    }
    if (prompt.kind === 'multiselect') {
      return [];
    }
    return prompt.nullable ? null : undefined;
  }

  switch (prompt.kind) {
    case 'number': {
      const value = Number(text);
      return Number.isFinite(value) ? value : text;
    }
    case 'select':
      return choiceAt(prompt, text);
    case 'multiselect':
      return text
        .split(',')
        .map((part) => part.trim())
        .filter((part) => part !== '')
        .map((part) => choiceAt(prompt, part));
    case 'text':
    case 'date':
      return text;
  }
}

function hintFor(prompt: FieldPrompt): string {
  const hints: string[] = [];
  if (prompt.kind === 'date') {
    hints.push('YYYY-MM-DD');
  }
  if (prompt.kind === 'multiselect') {
    hints.push('numbers separated by commas');
  }
  if (prompt.defaultValue !== undefined) {
    hints.push(`default ${JSON.stringify(prompt.defaultValue)}`);
  }
  if (prompt.nullable && prompt.kind !== 'multiselect') {
    hints.push('optional');
  }
  return hints.length > 0 ? ` (${hints.join(', ')})` : '';
}

/**
 * The prompts of a question, in field order.
 */
export function questionPrompts(question: Question): FieldPrompt[] {
  const properties = getOwn(question.schema, 'properties');
  return question.fieldNames.map((name) => {
    const schema = isJsonObject(properties) ? getOwn(properties, name) : undefined;
    return describeField(name, isJsonObject(schema) ? schema : {});
  });
}

/**
 * Displays a question and reads a response for each of its fields.
 *
 * @returns The response mapping, keyed by synthetic field name.
 */
export async function promptQuestion(
  question: Question,
  input: InputReader,
  output: OutputWriter,
  display: DisplayOptions
): Promise<JsonObject> {
  if (question.title !== undefined) {
    output.line(paint(question.title, 'bold', display));
  }
  if (question.description !== undefined) {
    output.line(question.description);
  }

  const responses: JsonObject = {};
  for (const prompt of questionPrompts(question)) {
    prompt.choices.forEach((choice, index) => {
      output.line(`  ${paint(`${String(index + 1)}.`, 'yellow', display)} ${choice.title}`);
    });
    const answer = parseAnswer(prompt, await input.readLine(`${prompt.title}${hintFor(prompt)}: `));
    if (answer !== undefined) {
      responses[prompt.name] = answer;
    }
  }
  return responses;
}

/**
 * Writes rejected fields under their titles.
 */
export function reportRejection(
  question: Question,
  details: readonly ValidationDetail[],
  output: OutputWriter,
  display: DisplayOptions
): void {
  const titles = new Map(questionPrompts(question).map((prompt) => [prompt.name, prompt.title]));
  for (const detail of details) {
    const title = titles.get(detail.field) ?? detail.field;
    output.line(`${paint(`${title}:`, 'red', display)} ${detail.message}`);
  }
}
