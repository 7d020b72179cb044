import { checkConstructorLists, checkListOrder } from "./ordering.js";
import { RuleCategory, Severity } from "./types.js";
import type { FileRule } from "./types.js";

export const exportOrderRule: FileRule = {
  id: "export-order",
  scope: "file",
  category: RuleCategory.Exports,
  severity: Severity.Error,
  description:
    "Export lists order kinds, classes, effects, types, operators, functions, then module re-exports, each alphabetically",
  check: (file) => {
    const exports = file.header?.exports;
    return exports ? checkListOrder(exports.items, "Export list") : [];
  },
};

export const exportConstructorsRule: FileRule = {
  id: "export-constructors",
  scope: "file",
  category: RuleCategory.Exports,
  severity: Severity.Error,
  description: "A type's constructors are exported all together or not at all",
  check: (file) => {
    const exports = file.header?.exports;
    return exports ? checkConstructorLists(exports.items, "Export list") : [];
  },
};
