/**
 * @jailprof/profile-dsl
 *
 * jailprof Profile DSL — line model, parser, formatter and type definitions
 * for sandbox profiles.
 *
 * This package is the base layer of jailprof. It defines:
 * - The keyword tables and guards of the profile language
 * - The Command, Conditional and Content unions
 * - parseCommand() / formatCommand(), parseContent() / formatContent()
 * - ProfileStream, diffStreams() and expandIncludes()
 *
 * All other jailprof packages depend on this package. This package has no
 * internal jailprof dependencies.
 */

// Types
export type {
  BindCommand,
  BlankContent,
  CapabilityCommand,
  CapabilityCommandKind,
  Command,
  CommandContent,
  CommandKind,
  CommentContent,
  Conditional,
  ConditionalContent,
  Content,
  ContentParseResult,
  DBusPolicyCommand,
  DBusPolicyCommandKind,
  EnvCommand,
  FlagCommand,
  FlagCommandKind,
  InvalidContent,
  Line,
  ListCommand,
  ListCommandKind,
  OptionalListCommand,
  OptionalListCommandKind,
  OptionalValueCommand,
  OptionalValueCommandKind,
  ProtocolCommand,
  Result,
  SeccompErrorAction,
  SeccompErrorActionCommand,
  ValueCommand,
  ValueCommandKind,
} from './types.js';
export type { StreamParseResult } from './stream.js';
export type { StreamDiff } from './diff.js';
export type { ExpandOptions, ExpandResult, IncludeGroups, ProfileSource } from './standalone.js';

export { Capability, DBusPolicy, ProfileErrorKind, Protocol } from './types.js';
export {
  CAPABILITY_LIST_KEYWORDS,
  DBUS_POLICY_KEYWORDS,
  FLAG_KEYWORDS,
  Guard,
  LIST_KEYWORDS,
  OPTIONAL_LIST_KEYWORDS,
  OPTIONAL_VALUE_KEYWORDS,
  VALUE_KEYWORDS,
} from './grammar.js';
export { IncludeDepthError, describeProfileError } from './errors.js';

// Functions
export {
  errnoNames,
  formatCapability,
  formatDBusPolicy,
  formatProtocol,
  formatSeccompErrorAction,
  parseCapability,
  parseDBusPolicy,
  parseProtocol,
  parseSeccompErrorAction,
} from './vocabulary.js';
export {
  formatCommand,
  isCapabilityCommand,
  isDBusPolicyCommand,
  isFlagCommand,
  isListCommand,
  isOptionalListCommand,
  isOptionalValueCommand,
  isValueCommand,
  parseCommand,
} from './command.js';
export { formatConditional, parseConditional } from './conditional.js';
export { contentEquals, formatContent, isBlank, isComment, isInvalid, parseContent } from './content.js';
export { ProfileStream } from './stream.js';
export { diffStreams } from './diff.js';
export { INCLUDE_DEPTH_LIMIT, collectIncludes, expandIncludes } from './standalone.js';
