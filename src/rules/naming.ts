import type { Declaration } from "../source/types.js";
import { RuleCategory, Severity } from "./types.js";
import type { FileRule, RuleHit } from "./types.js";

const LOWER_CAMEL_CASE = /^_?[a-z][A-Za-z0-9]*'*$/;
const UPPER_CAMEL_CASE = /^[A-Z][A-Za-z0-9]*'*$/;
const SINGULAR_ENDINGS = ["ss", "us", "is"] as const;
const SINGULAR_WORDS = new Set([
  "Alias",
  "Atlas",
  "Canvas",
  "Chaos",
  "Lens",
  "News",
  "Series",
  "Species",
]);

export const valueNameCaseRule: FileRule = {
  id: "value-name-case",
  scope: "file",
  category: RuleCategory.Naming,
  severity: Severity.Error,
  description: "Functions and values are named in lowerCamelCase",
  check: (file) =>
    file.declarations
      .filter(
        (declaration) =>
          declaration.kind === "value" &&
          !LOWER_CAMEL_CASE.test(declaration.name),
      )
      .map((declaration) => ({
        line: declaration.line,
        column: declaration.column,
        message: `Value "${declaration.name}" should be lowerCamelCase`,
      })),
};

export const typeNameCaseRule: FileRule = {
  id: "type-name-case",
  scope: "file",
  category: RuleCategory.Naming,
  severity: Severity.Error,
  description: "Types, classes and constructors are named in UpperCamelCase",
  check: (file) =>
    file.declarations
      .filter(
        (declaration) =>
          declaration.kind !== "value" &&
          !UPPER_CAMEL_CASE.test(declaration.name),
      )
      .map((declaration) => ({
        line: declaration.line,
        column: declaration.column,
        message: `${describeKind(declaration)} "${declaration.name}" should be UpperCamelCase`,
      })),
};

export const acronymCaseRule: FileRule = {
  id: "acronym-case",
  scope: "file",
  category: RuleCategory.Naming,
  severity: Severity.Advisory,
  description:
    "Acronyms are not fully capitalised, except 2-3 letter acronyms in type and constructor names",
  check: (file) => {
    const hits: RuleHit[] = [];
    for (const declaration of file.declarations) {
      const offending = findAcronyms(declaration.name).find(
        (acronym) => !acronymAllowed(acronym, declaration),
      );
      if (!offending) {
        continue;
      }
      hits.push({
        line: declaration.line,
        column: declaration.column,
        message: `"${declaration.name}" capitalises the acronym "${offending}"; consider "${capitalise(offending)}"`,
      });
    }
    return hits;
  },
};

export const moduleNamePluralRule: FileRule = {
  id: "module-name-plural",
  scope: "file",
  category: RuleCategory.Naming,
  severity: Severity.Advisory,
  description: "Module name segments are singular nouns",
  check: (file) => {
    const header = file.header;
    if (!header) {
      return [];
    }
    const hits: RuleHit[] = [];
    let offset = 0;
    for (const segment of header.name.split(".")) {
      if (looksPlural(segment)) {
        hits.push({
          line: header.line,
          column: header.column + offset,
          message: `Module name segment "${segment}" looks plural; prefer a singular noun`,
        });
      }
      offset += segment.length + 1;
    }
    return hits;
  },
};

/**
 * Fully capitalised runs of two or more letters. A capital that starts a
 * following lowercase word is not part of the run (`HTTPServer` → `HTTP`).
 */
export function findAcronyms(name: string): string[] {
  const acronyms: string[] = [];
  for (const match of name.matchAll(/[A-Z]{2,}/g)) {
    const run = match[0];
    const end = (match.index ?? 0) + run.length;
    const followedByLower = /[a-z]/.test(name.charAt(end));
    const acronym = followedByLower ? run.slice(0, -1) : run;
    if (acronym.length >= 2) {
      acronyms.push(acronym);
    }
  }
  return acronyms;
}

export function looksPlural(segment: string): boolean {
  if (!segment.endsWith("s") || SINGULAR_WORDS.has(segment)) {
    return false;
  }
  return !SINGULAR_ENDINGS.some((ending) => segment.endsWith(ending));
}

function acronymAllowed(acronym: string, declaration: Declaration): boolean {
  if (declaration.kind === "value") {
    return false;
  }
  return acronym.length === 2 || acronym.length === 3;
}

function capitalise(acronym: string): string {
  return acronym.charAt(0) + acronym.slice(1).toLowerCase();
}

function describeKind(declaration: Declaration): string {
  return declaration.kind === "constructor" ? "Constructor" : "Type";
}
