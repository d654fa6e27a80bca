export { ACCESS_LEVELS, type AccessLevelName, accessLevelForFlag } from './lib/access-levels.js';
export {
  type CallDescriptor,
  CONFIGURE_METHOD,
  type Invocation,
  normalizeName,
  PAGINATOR_METHOD,
  type ParamValue,
  type Params,
  parseTokens,
  translateArgs,
} from './lib/cli-args.js';
export {
  type CommandHandler,
  type CommandInvocation,
  CommandRegistry,
  type CommandSummary,
  createCommandRegistry,
} from './lib/commands.js';
export {
  type GitLabConfigFile,
  type GitLabCredentials,
  readConfigFile,
  resolveConfigPath,
  resolveCredentials,
  writeConfigFile,
} from './lib/config.js';
export { type Endpoint, loadEndpoints, resolveRoute } from './lib/endpoints.js';
export {
  ConfigError,
  GatewayError,
  type GatewayErrorCode,
  GitLabApiError,
  UnknownCommandError,
  UsageError,
} from './lib/errors.js';
export { type ApiResult, GitLabClient, type GitLabClientOptions, type HttpVerb } from './lib/gitlab-client.js';
export { Paginator } from './lib/paginator.js';
