/**
 * Assembly Line Parser
 *
 * Classifies one source line into one of four shapes. Each shape may start
 * with a `label:` and end with a comment introduced by `#` or `;`.
 *
 *   FULL      [label:] OPCODE[/PRED] target,src1,src2[offset]
 *   DATA      [label:] DATA [value]
 *   SYMBOLIC  [label:] LOAD|STORE|JUMP[/PRED] [target,] symbol
 *   COMMENT   [label:] [comment]
 *
 * Shapes are tried in that order and the first match wins.
 */

export enum LineKind {
  COMMENT = 'COMMENT',
  FULL = 'FULL',
  DATA = 'DATA',
  SYMBOLIC = 'SYMBOLIC',
}

interface LineBase {
  label?: string;
  comment?: string;
}

export interface CommentLine extends LineBase {
  kind: LineKind.COMMENT;
}

export interface FullLine extends LineBase {
  kind: LineKind.FULL;
  opcode: string;
  predicate: string;
  target: string;
  src1: string;
  src2: string;
  offset: number;
}

export interface DataLine extends LineBase {
  kind: LineKind.DATA;
  value: number;
}

export type SymbolicOpcode = 'LOAD' | 'STORE' | 'JUMP';

export interface SymbolicLine extends LineBase {
  kind: LineKind.SYMBOLIC;
  opcode: SymbolicOpcode;
  /** Predicate text as written; absent means ALWAYS */
  predicate?: string;
  target?: string;
  symbol: string;
}

export type AsmLine = CommentLine | FullLine | DataLine | SymbolicLine;

export const DEFAULT_PREDICATE = 'ALWAYS';

export class AsmSyntaxError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'AsmSyntaxError';
  }
}

const LABEL = String.raw`(?:(?<label>[a-zA-Z]\w*):)?`;
const COMMENT = String.raw`(?:\s*(?<comment>[#;].*?))?\s*`;
const REG = String.raw`r[0-9]+|zero|pc`;

const FULL_PATTERN = new RegExp(
  String.raw`^\s*${LABEL}\s*` +
    String.raw`(?<opcode>[a-zA-Z]+)(?:(?:/|\s+)(?<predicate>[a-zA-Z]+))?\s+` +
    String.raw`(?<target>${REG}),(?<src1>${REG}),(?<src2>${REG})` +
    String.raw`(?:\[(?<offset>-?[0-9]+)\])?` +
    String.raw`${COMMENT}$`
);

const DATA_PATTERN = new RegExp(
  String.raw`^\s*${LABEL}\s*DATA` +
    String.raw`(?:\s+(?<value>0x[a-fA-F0-9]+|-?[0-9]+))?` +
    String.raw`${COMMENT}$`
);

const SYMBOLIC_PATTERN = new RegExp(
  String.raw`^\s*${LABEL}\s*` +
    String.raw`(?<opcode>LOAD|STORE|JUMP)(?:/(?<predicate>[a-zA-Z]+))?\s+` +
    String.raw`(?:(?<target>${REG}),)?(?<symbol>[a-zA-Z]\w*)` +
    String.raw`${COMMENT}$`
);

const COMMENT_PATTERN = new RegExp(String.raw`^\s*${LABEL}${COMMENT}$`);

type Groups = Record<string, string | undefined>;

function base(groups: Groups): LineBase {
  const line: LineBase = {};
  if (groups.label !== undefined) line.label = groups.label;
  if (groups.comment !== undefined) line.comment = groups.comment;
  return line;
}

function required(groups: Groups, name: string): string {
  const value = groups[name];
  if (value === undefined) {
    throw new AsmSyntaxError(`Missing ${name}`);
  }
  return value;
}

function isSymbolicOpcode(text: string): text is SymbolicOpcode {
  return text === 'LOAD' || text === 'STORE' || text === 'JUMP';
}

function matchFull(text: string): FullLine | null {
  const groups = FULL_PATTERN.exec(text)?.groups;
  if (!groups) return null;
  return {
    kind: LineKind.FULL,
    ...base(groups),
    opcode: required(groups, 'opcode'),
    predicate: groups.predicate ?? DEFAULT_PREDICATE,
    target: required(groups, 'target'),
    src1: required(groups, 'src1'),
    src2: required(groups, 'src2'),
    offset: groups.offset === undefined ? 0 : parseInt(groups.offset, 10),
  };
}

function matchData(text: string): DataLine | null {
  const groups = DATA_PATTERN.exec(text)?.groups;
  if (!groups) return null;
  const value = groups.value;
  return {
    kind: LineKind.DATA,
    ...base(groups),
    value: value === undefined ? 0 : value.startsWith('0x') ? parseInt(value.slice(2), 16) : parseInt(value, 10),
  };
}

function matchSymbolic(text: string): SymbolicLine | null {
  const groups = SYMBOLIC_PATTERN.exec(text)?.groups;
  if (!groups) return null;
  const opcode = required(groups, 'opcode');
  if (!isSymbolicOpcode(opcode)) return null;

  const line: SymbolicLine = {
    kind: LineKind.SYMBOLIC,
    ...base(groups),
    opcode,
    symbol: required(groups, 'symbol'),
  };
  if (groups.predicate !== undefined) line.predicate = groups.predicate;
  if (groups.target !== undefined) line.target = groups.target;
  return line;
}

function matchComment(text: string): CommentLine | null {
  const groups = COMMENT_PATTERN.exec(text)?.groups;
  if (!groups) return null;
  return { kind: LineKind.COMMENT, ...base(groups) };
}

/**
 * Parse one line of assembly source.
 * Throws AsmSyntaxError if no shape matches.
 */
export function parseLine(text: string): AsmLine {
  const line = matchFull(text) ?? matchData(text) ?? matchSymbolic(text) ?? matchComment(text);
  if (!line) {
    throw new AsmSyntaxError(`Syntax error in '${text.trim()}'`);
  }
  return line;
}
