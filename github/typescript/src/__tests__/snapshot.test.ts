/**
 * Import workflow against committed snapshots.
 *
 * Runs offline by default. `SNAPSHOT_MODE=record` re-records the fixtures
 * against the live API using the credentials read by `configFromEnv`;
 * `SNAPSHOT_MODE=bypass` runs the same workflow live without writing.
 */

import { fileURLToPath } from 'url';
import { describe, expect, it } from 'vitest';
import { GitHubErrorKind } from '../errors.js';
import { simulationSettingsFromEnv, type SimulationSettings } from '../simulation/config.js';
import { SnapshotProjectsClient } from '../simulation/facade.js';
import { SimulationMode } from '../simulation/types.js';
import { createLoggerFromEnv } from '../observability/logging.js';

const FIXTURE_DIRECTORY = fileURLToPath(new URL('../../testdata/snapshots', import.meta.url));

function settings(): SimulationSettings {
  const fromEnv = simulationSettingsFromEnv();
  return {
    mode: fromEnv.mode,
    snapshotDirectory: fromEnv.snapshotDirectory ?? FIXTURE_DIRECTORY,
    matchPolicy: fromEnv.matchPolicy ?? 'strict',
  };
}

async function withScenario(scenario: string, run: (client: SnapshotProjectsClient) => Promise<void>): Promise<void> {
  const client = await SnapshotProjectsClient.open({
    scenario,
    settings: settings(),
    logger: createLoggerFromEnv({ LOG_LEVEL: process.env.LOG_LEVEL ?? 'warn' }),
  });
  try {
    await run(client);
  } finally {
    await client.close();
  }
}

describe('Snapshot scenarios', () => {
  it('imports a draft issue and sets its status', async () => {
    await withScenario('import-draft-issue', async (client) => {
      expect(await client.getUser()).toBe('alice');

      const project = await client.findProject('octo-org/Roadmap');
      expect(project).toEqual({
        id: 'PVT_kwDOBf3ZQc4AbCdE',
        number: 3,
        title: 'Roadmap',
        url: 'https://github.com/orgs/octo-org/projects/3',
      });

      const fields = await client.getProjectFields(project.id);
      const status = fields.find((field) => field.name === 'Status');
      const inProgress = status?.options?.find((option) => option.name === 'In Progress');
      expect(fields.map((field) => field.name)).toEqual(['Title', 'Status', 'Sprint']);
      expect(inProgress?.id).toBe('47fc9ee4');

      const itemId = await client.createDraftIssue(project.id, 'Document snapshot workflow', 'Imported from backlog.csv');
      expect(itemId).toBe('PVTI_lADOBf3ZQc4AbCdEzgXyZ01');

      await client.setProjectItemFieldValue(project.id, itemId, status?.id ?? '', {
        singleSelectOptionId: inProgress?.id ?? '',
      });
      await client.deleteProjectItem(project.id, itemId);

      if (client.mode !== SimulationMode.Bypass) {
        expect(client.cursor ?? client.interactions().length).toBe(6);
      }
    });
  });

  it('reports a project that does not exist', async () => {
    await withScenario('missing-project', async (client) => {
      await expect(client.findProject('octo-org/Archived')).rejects.toMatchObject({
        kind: GitHubErrorKind.NotFound,
        statusCode: 404,
        message: 'project octo-org/Archived not found',
      });
    });
  });
});
