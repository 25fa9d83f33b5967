import { ViperkError } from "#errors";
import type { SourceLocation } from "#ast";

export enum TranslateErrorCode {
  // The shape of the node has no IR counterpart
  UNSUPPORTED_TOP_LEVEL = "TRANSLATE001",
  UNSUPPORTED_STATEMENT = "TRANSLATE002",
  UNSUPPORTED_CALL_STATEMENT = "TRANSLATE003",
  UNSUPPORTED_EXPRESSION = "TRANSLATE004",
  UNSUPPORTED_VARIABLE = "TRANSLATE005",
  UNSUPPORTED_TYPE = "TRANSLATE006",

  // The shape is recognized but part of it is outside the subset
  UNSUPPORTED_OPERATOR = "TRANSLATE101",
  CHAINED_COMPARISON = "TRANSLATE102",
  BOOLEAN_OPERAND_COUNT = "TRANSLATE103",
  KEYWORD_ARGUMENT = "TRANSLATE104",
  NONE_LITERAL = "TRANSLATE105",
  SLICE_INDEX = "TRANSLATE106",
  DECLARATION_INITIALIZER = "TRANSLATE107",
  MULTIPLE_TARGETS = "TRANSLATE108",
  LOOP_ELSE = "TRANSLATE109",
  RANGE_ARGUMENTS = "TRANSLATE110",
  LOOP_TARGET = "TRANSLATE111",
  ASSERT_MESSAGE = "TRANSLATE112",
  BUILTIN_ARGUMENTS = "TRANSLATE113",
  UNSUPPORTED_UNIT = "TRANSLATE114",
  UNSUPPORTED_PARAMETER = "TRANSLATE115",
  UNSUPPORTED_DECORATOR = "TRANSLATE116",
  INVALID_EVENT = "TRANSLATE117",
  INVALID_FIELD_NAME = "TRANSLATE118",
  INVALID_SIZE = "TRANSLATE119",
}

export const TranslateErrorMessages = {
  [TranslateErrorCode.UNSUPPORTED_TOP_LEVEL]: "Unsupported top level node",
  [TranslateErrorCode.UNSUPPORTED_STATEMENT]: "Unsupported statement",
  [TranslateErrorCode.UNSUPPORTED_CALL_STATEMENT]:
    "Unsupported call statement",
  [TranslateErrorCode.UNSUPPORTED_EXPRESSION]: "Unsupported expression",
  [TranslateErrorCode.UNSUPPORTED_VARIABLE]: "Unsupported variable",
  [TranslateErrorCode.UNSUPPORTED_TYPE]: "Unsupported type",
  [TranslateErrorCode.UNSUPPORTED_OPERATOR]: "Unsupported operator",
  [TranslateErrorCode.CHAINED_COMPARISON]:
    "Chained comparisons are not supported",
  [TranslateErrorCode.BOOLEAN_OPERAND_COUNT]:
    "Boolean operators take exactly two operands",
  [TranslateErrorCode.KEYWORD_ARGUMENT]:
    "Keyword and starred arguments are not supported",
  [TranslateErrorCode.NONE_LITERAL]: "None is not supported",
  [TranslateErrorCode.SLICE_INDEX]: "Slices are not supported",
  [TranslateErrorCode.DECLARATION_INITIALIZER]:
    "Declarations cannot have an initializer",
  [TranslateErrorCode.MULTIPLE_TARGETS]:
    "Assignments take exactly one target",
  [TranslateErrorCode.LOOP_ELSE]: "Loops cannot have an else branch",
  [TranslateErrorCode.RANGE_ARGUMENTS]: "range() takes one or two arguments",
  [TranslateErrorCode.LOOP_TARGET]: "Loop variable must be a name",
  [TranslateErrorCode.ASSERT_MESSAGE]: "Assertion messages are not supported",
  [TranslateErrorCode.BUILTIN_ARGUMENTS]: "Wrong number of arguments",
  [TranslateErrorCode.UNSUPPORTED_UNIT]: "Unsupported unit",
  [TranslateErrorCode.UNSUPPORTED_PARAMETER]: "Unsupported parameter",
  [TranslateErrorCode.UNSUPPORTED_DECORATOR]:
    "Decorators must be bare names",
  [TranslateErrorCode.INVALID_EVENT]: "Invalid event declaration",
  [TranslateErrorCode.INVALID_FIELD_NAME]: "Field names must be identifiers",
  [TranslateErrorCode.INVALID_SIZE]: "Sizes must be integer literals",
};

export type Flavor = "structural" | "detail";

const STRUCTURAL: ReadonlySet<TranslateErrorCode> = new Set([
  TranslateErrorCode.UNSUPPORTED_TOP_LEVEL,
  TranslateErrorCode.UNSUPPORTED_STATEMENT,
  TranslateErrorCode.UNSUPPORTED_CALL_STATEMENT,
  TranslateErrorCode.UNSUPPORTED_EXPRESSION,
  TranslateErrorCode.UNSUPPORTED_VARIABLE,
  TranslateErrorCode.UNSUPPORTED_TYPE,
]);

/**
 * Raised for any construct outside the translatable subset.
 *
 * `flavor` tells apart nodes whose shape has no mapping at all
 * (`"structural"`) from recognized shapes with an unsupported detail
 * (`"detail"`).
 */
export class UnsupportedConstruct extends ViperkError {
  public readonly flavor: Flavor;

  constructor(
    code: TranslateErrorCode,
    message?: string,
    location?: SourceLocation | null,
  ) {
    const baseMessage = TranslateErrorMessages[code];
    const fullMessage = message ? `${baseMessage}: ${message}` : baseMessage;
    super(fullMessage, code, location ?? undefined);
    this.flavor = STRUCTURAL.has(code) ? "structural" : "detail";
  }
}
