/**
 * Central type exports for deploy-studio
 */

// Project analysis types
export {
  ProjectTypeSchema,
  EnvVarNameSchema,
  PROJECT_TYPE_LABELS,
  type ProjectType,
  type EnvVarName,
  type DetectedFiles,
  type DetectedFileKind,
  type Classification,
  type ProjectAnalysis,
} from './project.js';

// Errors
export {
  DeployStudioError,
  InvalidPathError,
  FileReadError,
  ExternalToolError,
  ProviderError,
  ParseError,
  toErrorMessage,
  type ErrorCode,
} from './errors.js';

// Chat types
export {
  AIProviderSchema,
  AI_PROVIDERS,
  type AIProvider,
  type ChatRequest,
  type ChatResult,
  type ChatSettings,
} from './chat.js';

// Netlify CLI types
export {
  type DeployTarget,
  type CommandResult,
  type DeployOutcome,
  type NetlifyTeam,
  type NetlifySite,
} from './netlify.js';
