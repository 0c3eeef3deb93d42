import type { CompareOp, VarOperand, VarValue } from "../core/types.js";

export type VariableStore = Record<string, VarValue>;

/** Prototype-free store, so names like `__proto__` and `constructor` are plain variables. */
export const createVariableStore = (entries: Iterable<[string, VarValue]> = []): VariableStore => {
  const store: VariableStore = Object.create(null);
  for (const [name, value] of entries) {
    store[name] = value;
  }
  return store;
};

const NUMERIC_TEXT = /^[+-]?(\d+(\.\d*)?|\.\d+)([eE][+-]?\d+)?$/;

/** Numeric view of a value, or null when it has none. */
export const coerceNumber = (value: VarValue | undefined): number | null => {
  if (typeof value === "number") {
    return Number.isFinite(value) ? value : null;
  }
  if (typeof value === "boolean") {
    return value ? 1 : 0;
  }
  if (typeof value === "string") {
    const trimmed = value.trim();
    return NUMERIC_TEXT.test(trimmed) ? Number(trimmed) : null;
  }
  return null;
};

export const compareNumbers = (left: number, op: CompareOp, right: number): boolean => {
  switch (op) {
    case "==":
      return left === right;
    case "!=":
      return left !== right;
    case ">":
      return left > right;
    case ">=":
      return left >= right;
    case "<":
      return left < right;
    case "<=":
      return left <= right;
  }
};

/**
 * Relational operators need both sides numeric and otherwise fail;
 * `==`/`!=` fall back to strict equality when either side is not numeric.
 */
export const compareValues = (
  left: VarValue | undefined,
  op: CompareOp,
  right: VarValue | undefined
): boolean => {
  const leftNumber = coerceNumber(left);
  const rightNumber = coerceNumber(right);
  if (leftNumber !== null && rightNumber !== null) {
    return compareNumbers(leftNumber, op, rightNumber);
  }
  if (op === "==") {
    return left === right;
  }
  if (op === "!=") {
    return left !== right;
  }
  return false;
};

export const resolveOperand = (operand: VarOperand, vars: VariableStore): VarValue | undefined => {
  if (operand.type === "literal") {
    return operand.value;
  }
  return Object.hasOwn(vars, operand.name) ? vars[operand.name] : undefined;
};

const PLACEHOLDER = /\$\{([A-Za-z_][A-Za-z0-9_.]*)\}|\$([A-Za-z_][A-Za-z0-9_]*)/g;

/** Substitutes `${name}` and `$name` with current values; unknown names stay as written. */
export const interpolate = (text: string, vars: VariableStore): string => {
  return text.replace(PLACEHOLDER, (match: string, braced: string | undefined, bare: string | undefined) => {
    const name = braced ?? bare ?? "";
    return Object.hasOwn(vars, name) ? String(vars[name]) : match;
  });
};

export const addToVariable = (current: VarValue | undefined, amount: number): number => {
  return typeof current === "number" && Number.isFinite(current) ? current + amount : amount;
};
