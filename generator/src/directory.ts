import { directoryTimestamp } from "./dates.js";

/**
 * Name of the directory the repository is created in.
 *
 * With a remote URL this is the text between its last "/" and last ".",
 * so `https://example.com/foo/bar-project.git` gives `bar-project`.
 * URLs are not validated; odd input gives an odd (possibly empty) name.
 */
export function determineDirectory(repository: string | undefined, now: Date): string {
  if (repository) {
    const start = repository.lastIndexOf("/") + 1;
    const end = repository.lastIndexOf(".");
    return repository.slice(start, end);
  }
  return `repository-${directoryTimestamp(now)}`;
}
