/**
 * Credential Resolution
 *
 * The GitHub token is read from the environment only; it is never
 * written to the config file.
 */

export function resolveGitHubToken(): string | null {
  const token = process.env['GITHUB_TOKEN']?.trim();
  return token ? token : null;
}
