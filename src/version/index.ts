/**
 * Version module
 *
 * Gem version ordering and requirement parsing.
 */

export {
  GemVersion,
  VERSION_PATTERN,
  isValidVersion,
  compareVersions,
} from "./version";

export {
  Requirement,
  RequirementParseError,
  REQUIREMENT_OPERATORS,
  parseConstraint,
  createDependency,
  type Constraint,
  type Dependency,
  type DependencyType,
  type RequirementOperator,
} from "./requirement";
