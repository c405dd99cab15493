export {
  safeParseYaml,
  formatZodIssues,
  formatFriendlyError,
  settingsError,
  type FriendlyError,
  type ParseErrorType,
  type ParseResult,
} from "./friendly-errors";
