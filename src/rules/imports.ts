import type { ImportDeclaration, ParsedSource } from "../source/types.js";
import type { LintConfig } from "../config/types.js";
import {
  checkConstructorLists,
  checkListOrder,
  compareNames,
  firstOutOfOrder,
} from "./ordering.js";
import { RuleCategory, Severity } from "./types.js";
import type { FileRule, RuleHit } from "./types.js";

export type ImportGroup = "prelude" | "third-party" | "local";

const GROUP_RANK: Readonly<Record<ImportGroup, number>> = {
  prelude: 0,
  "third-party": 1,
  local: 2,
};

export const importOrderRule: FileRule = {
  id: "import-order",
  scope: "file",
  category: RuleCategory.Imports,
  severity: Severity.Error,
  description:
    "Import lists order kinds, classes, effects, types, operators, then functions, each alphabetically",
  check: (file) =>
    file.imports.flatMap((declaration) =>
      declaration.items
        ? checkListOrder(
            declaration.items,
            `Import list of ${declaration.moduleName}`,
          )
        : [],
    ),
};

export const importConstructorsRule: FileRule = {
  id: "import-constructors",
  scope: "file",
  category: RuleCategory.Imports,
  severity: Severity.Error,
  description: "A type's constructors are imported all together or not at all",
  check: (file) =>
    file.imports.flatMap((declaration) =>
      declaration.items
        ? checkConstructorLists(
            declaration.items,
            `Import list of ${declaration.moduleName}`,
          )
        : [],
    ),
};

export const importGroupsRule: FileRule = {
  id: "import-groups",
  scope: "file",
  category: RuleCategory.Imports,
  severity: Severity.Error,
  description:
    "Imports are grouped prelude, third-party, local; groups are sorted and separated by one blank line",
  check: (file, { config }) => [
    ...checkGroupLayout(file, config),
    ...checkGroupSorting(file, config),
  ],
};

export function classifyImport(
  moduleName: string,
  file: ParsedSource,
  config: LintConfig,
): ImportGroup {
  if (moduleName === "Prelude") {
    return "prelude";
  }
  const prefixes = localPrefixes(file, config);
  const isLocal = prefixes.some(
    (prefix) => moduleName === prefix || moduleName.startsWith(`${prefix}.`),
  );
  return isLocal ? "local" : "third-party";
}

function localPrefixes(file: ParsedSource, config: LintConfig): string[] {
  if (config.localModulePrefixes.length > 0) {
    return config.localModulePrefixes.map((prefix) =>
      prefix.replace(/\.+$/, ""),
    );
  }
  const root = file.header?.name.split(".")[0];
  return root ? [root] : [];
}

function checkGroupLayout(file: ParsedSource, config: LintConfig): RuleHit[] {
  const hits: RuleHit[] = [];
  for (let index = 1; index < file.imports.length; index += 1) {
    const previous = file.imports[index - 1];
    const current = file.imports[index];
    if (!previous || !current) {
      continue;
    }
    const previousGroup = classifyImport(previous.moduleName, file, config);
    const currentGroup = classifyImport(current.moduleName, file, config);

    if (GROUP_RANK[currentGroup] < GROUP_RANK[previousGroup]) {
      hits.push({
        line: current.line,
        column: 0,
        message: `Import of ${current.moduleName} (${currentGroup}) belongs before the ${previousGroup} imports`,
      });
    }

    const blanks = countBlankLines(file, previous, current);
    if (currentGroup !== previousGroup && blanks !== 1) {
      hits.push({
        line: current.line,
        column: 0,
        message: `Separate the ${previousGroup} and ${currentGroup} import groups with exactly one blank line (found ${blanks})`,
      });
    } else if (currentGroup === previousGroup && blanks > 0) {
      hits.push({
        line: current.line,
        column: 0,
        message: `Blank line inside the ${currentGroup} import group`,
      });
    }
  }
  return hits;
}

function checkGroupSorting(file: ParsedSource, config: LintConfig): RuleHit[] {
  const hits: RuleHit[] = [];
  const groups: ImportGroup[] = ["prelude", "third-party", "local"];
  for (const group of groups) {
    const members = file.imports.filter(
      (declaration) =>
        classifyImport(declaration.moduleName, file, config) === group,
    );
    const unqualified = members.filter((declaration) => !declaration.alias);
    const qualified = members.filter((declaration) => declaration.alias);
    hits.push(...checkSorted(unqualified, `${group} imports`));
    hits.push(...checkSorted(qualified, `qualified ${group} imports`));
  }
  return hits;
}

function checkSorted(
  declarations: readonly ImportDeclaration[],
  label: string,
): RuleHit[] {
  const pair = firstOutOfOrder(declarations, (a, b) =>
    compareNames(a.moduleName, b.moduleName),
  );
  if (!pair) {
    return [];
  }
  const [previous, current] = pair;
  return [
    {
      line: current.line,
      column: 0,
      message: `The ${label} are not sorted: ${previous.moduleName} should come after ${current.moduleName}`,
    },
  ];
}

function countBlankLines(
  file: ParsedSource,
  previous: ImportDeclaration,
  current: ImportDeclaration,
): number {
  return file.lines
    .slice(previous.endLine + 1, current.line)
    .filter((line) => line.isBlank).length;
}
