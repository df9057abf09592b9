import {
  openBlameSource,
  type BlameSourceProgressEvent,
  type OpenBlameSourceInput,
  type OpenBlameSourceResult,
} from "./application/open-blame-source.js";
import { ExecGitCommandClient } from "./infrastructure/git-command-client.js";

export type {
  BlameSourceProgressEvent,
  OpenBlameSourceInput,
  OpenBlameSourceResult,
  OpenedBlameSource,
  UnavailableBlameSource,
} from "./application/open-blame-source.js";
export {
  DEFAULT_BLAME_SOURCE_CONFIG,
  type AuthorIdentityMode,
  type BlameLineRecord,
  type BlameSourceConfig,
} from "./domain/blame-types.js";
export { GitCliBlameSource } from "./infrastructure/git-blame-source.js";

export const openGitBlameSource = (
  input: OpenBlameSourceInput,
  onProgress?: (event: BlameSourceProgressEvent) => void,
): Promise<OpenBlameSourceResult> => openBlameSource(input, new ExecGitCommandClient(), onProgress);
