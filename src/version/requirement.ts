/**
 * Version requirements and dependencies
 *
 * A requirement is a list of (operator, version) constraints that must all
 * hold. Registries send them as strings like ">= 1.0" or "~> 2.1, < 2.3".
 */

import { GemVersion, VERSION_PATTERN } from "./version";

export const REQUIREMENT_OPERATORS = ["=", "!=", ">", "<", ">=", "<=", "~>"] as const;
export type RequirementOperator = (typeof REQUIREMENT_OPERATORS)[number];

const REQUIREMENT_PATTERN = new RegExp(`^\\s*(=|!=|>=|<=|>|<|~>)?\\s*(${VERSION_PATTERN})\\s*$`);

export interface Constraint {
  operator: RequirementOperator;
  version: GemVersion;
}

export class RequirementParseError extends Error {
  constructor(readonly input: string) {
    super(`Ill-formed requirement ${JSON.stringify(input)}`);
    this.name = "RequirementParseError";
  }
}

function isOperator(value: string): value is RequirementOperator {
  return REQUIREMENT_OPERATORS.some((operator) => operator === value);
}

export function parseConstraint(input: string): Constraint {
  const match = input.match(REQUIREMENT_PATTERN);
  if (!match) {
    throw new RequirementParseError(input);
  }
  const [, operator = "=", version = "0"] = match;
  if (!isOperator(operator)) {
    throw new RequirementParseError(input);
  }
  return { operator, version: new GemVersion(version) };
}

function satisfies(constraint: Constraint, version: GemVersion): boolean {
  const cmp = version.compare(constraint.version);
  switch (constraint.operator) {
    case "=":
      return cmp === 0;
    case "!=":
      return cmp !== 0;
    case ">":
      return cmp > 0;
    case "<":
      return cmp < 0;
    case ">=":
      return cmp >= 0;
    case "<=":
      return cmp <= 0;
    case "~>":
      return cmp >= 0 && version.release().compare(constraint.version.bump()) < 0;
  }
}

export class Requirement {
  readonly constraints: readonly Constraint[];

  private constructor(constraints: Constraint[]) {
    this.constraints = constraints;
  }

  /**
   * Parse one or more requirement strings. No strings means ">= 0".
   * Throws RequirementParseError on the first ill-formed string.
   */
  static parse(...inputs: string[]): Requirement {
    const constraints = inputs.map(parseConstraint);
    if (constraints.length === 0) {
      constraints.push({ operator: ">=", version: new GemVersion("0") });
    }
    return new Requirement(constraints);
  }

  /**
   * Parse the comma-joined form used on the wire ("~> 1.0, >= 1.0.2").
   */
  static parseList(joined: string): Requirement {
    const parts = joined
      .split(",")
      .map((part) => part.trim())
      .filter((part) => part !== "");
    return Requirement.parse(...parts);
  }

  satisfiedBy(version: string | GemVersion): boolean {
    const parsed = GemVersion.parse(version);
    return this.constraints.every((constraint) => satisfies(constraint, parsed));
  }

  asList(): string[] {
    return this.constraints.map((c) => `${c.operator} ${c.version}`);
  }

  toString(): string {
    return this.asList().join(", ");
  }
}

export type DependencyType = "runtime" | "development";

export interface Dependency {
  name: string;
  requirement: Requirement;
  type: DependencyType;
}

export function createDependency(name: string, requirement: Requirement, type: DependencyType = "runtime"): Dependency {
  return { name, requirement, type };
}
