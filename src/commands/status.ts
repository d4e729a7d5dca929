/**
 * momentum status — Configuration and History Overview
 */

import { resolveConfigDir } from '../config/paths.js';
import { projectConfigExists, loadProjectConfig } from '../config/project-config.js';
import { resolveGitHubToken } from '../config/credentials.js';
import { withEngine } from '../orchestrator/engine.js';
import { VERSION } from '../version.js';

export function runStatus(): string {
  const configured = projectConfigExists();
  const project = loadProjectConfig();

  return withEngine(project, (engine) => {
    const dates = engine.storage.store.listDates();
    const latest = dates[dates.length - 1];

    const lines: string[] = [];
    lines.push(`Momentum v${VERSION}`);
    lines.push('');
    lines.push(`Config dir:   ${resolveConfigDir()}`);
    lines.push(
      `Config file:  ${configured ? 'Found' : 'Not configured (run "momentum init"), using defaults'}`
    );
    lines.push(
      `GitHub:       ${resolveGitHubToken() ? 'Token configured' : 'Not configured (set GITHUB_TOKEN)'}`
    );
    lines.push(`Storage:      ${engine.storage.kind} at ${engine.storage.location}`);
    lines.push(`Snapshots:    ${dates.length}${latest ? ` (latest ${latest})` : ''}`);
    lines.push(
      `Scoring:      threshold ${engine.config.threshold.toFixed(1)}, trend window ${engine.config.trendWindow}`
    );
    lines.push(`Repositories: ${project.repositories.length}`);
    for (const name of project.repositories) {
      lines.push(`  - ${name}`);
    }

    return lines.join('\n');
  });
}
