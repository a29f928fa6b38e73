/**
 * Core type definitions for the infobox query system
 */

/** Ordered tokens; may contain the `%` wildcard */
export type Pattern = string[];

export interface TerminateSignal {
  readonly terminate: true;
}

export type ActionResult = string[] | TerminateSignal;

export type Action = (captured: string[]) => Promise<ActionResult>;

export interface ActionTableEntry {
  pattern: Pattern;
  action: Action;
}

export type QueryResult =
  | { kind: 'answers'; answers: string[] }
  | { kind: 'no-answers' }
  | { kind: 'not-understood' }
  | { kind: 'terminate' };

/**
 * Resolves a free-text subject to the markup of its page
 */
export interface PageSource {
  fetchPageHtml(subject: string): Promise<string>;
}

/**
 * One regex layout for a field. `read` maps the match to the value;
 * without it the field's named group is used.
 */
export interface FieldCandidate {
  pattern: RegExp;
  read?: (match: RegExpMatchArray) => string;
}

export interface FieldDefinition {
  name: string;
  group: string;
  candidates: FieldCandidate[];
  missingText: string;
}
