/**
 * Tests for checkpoint serialization and file persistence
 */

import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { mkdir, readFile, writeFile } from 'node:fs/promises';
import { join } from 'node:path';
import {
  CheckpointManager,
  createOperationConfig,
  deserializeCheckpoint,
  getCheckpointSummary,
  getCompletionPercentage,
  getResumeBlocker,
  getSuccessRate,
  isResumable,
  loadCheckpointFile,
  saveCheckpointFile,
  serializeCheckpoint,
  checkpointFileExists,
  type Checkpoint,
} from '../../lib/src/checkpoint/index.js';
import {
  CheckpointNotFoundError,
  MalformedCheckpointError,
  PersistenceError,
} from '../../lib/src/errors/index.js';
import { createSilentLogger, createTempDir, removeTempDir } from '../helpers.js';

const CREATED_AT = '2024-03-05T10:00:00.000Z';

function buildCheckpoint(items: string[] = ['a|1', 'b|2', 'c|3'], batchSize = 2): Checkpoint {
  const manager = new CheckpointManager({
    directory: '/unused',
    logger: createSilentLogger(),
    now: () => new Date(CREATED_AT),
  });
  return manager.createCheckpoint(
    'batch_delete',
    createOperationConfig(
      { operation: 'batch_delete', revokeSessions: true },
      { environment: 'prod', inputFile: 'users.txt', extensions: { ticket: 'OPS-1', retries: 2 } }
    ),
    items,
    batchSize
  );
}

describe('serializeCheckpoint / deserializeCheckpoint', () => {
  it('should write snake_case fields', () => {
    const document: unknown = JSON.parse(serializeCheckpoint(buildCheckpoint()));

    expect(document).toMatchObject({
      operation_type: 'batch_delete',
      status: 'active',
      created_at: CREATED_AT,
      config: {
        environment: 'prod',
        input_file: 'users.txt',
        params: { operation: 'batch_delete', revoke_sessions: true },
        extensions: { ticket: 'OPS-1', retries: 2 },
      },
      progress: { current_batch: 0, total_batches: 2, current_item: 0, total_items: 3, batch_size: 2 },
      remaining_items: ['a|1', 'b|2', 'c|3'],
      processed_items: [],
      version: '1.0.0',
    });
  });

  it('should restore an equal checkpoint', () => {
    const checkpoint = buildCheckpoint();
    checkpoint.results.errors.push({
      item: 'b|2',
      error: 'GET /api/v2/users/b%7C2 returned 503',
      timestamp: CREATED_AT,
      operation: 'batch_delete',
    });
    checkpoint.results.multipleMatches['x@example.com'] = ['a|1', 'a|2'];

    expect(deserializeCheckpoint(serializeCheckpoint(checkpoint))).toEqual(checkpoint);
  });

  it('should fill defaults for a legacy document', () => {
    const checkpoint = deserializeCheckpoint(
      JSON.stringify({
        id: 'old',
        operation_type: 'batch_block',
        created_at: CREATED_AT,
        updated_at: CREATED_AT,
        remaining_items: ['a|1'],
      })
    );

    expect(checkpoint.version).toBe('0.0.0');
    expect(checkpoint.status).toBe('active');
    expect(checkpoint.config.environment).toBe('dev');
    expect(checkpoint.config.params).toEqual({ operation: 'batch_block', revokeSessions: false });
    expect(checkpoint.progress.batchSize).toBe(50);
    expect(checkpoint.results.processedCount).toBe(0);
    expect(isResumable(checkpoint)).toBe(false);
    expect(getResumeBlocker(checkpoint)).toBe('schema version 0.0.0 is not compatible with 1.0.0');
  });

  it('should use the default export fields when none are stored', () => {
    const checkpoint = deserializeCheckpoint(
      JSON.stringify({
        operation_type: 'export_last_login',
        created_at: CREATED_AT,
        updated_at: CREATED_AT,
        config: { output_file: 'out.csv', params: { operation: 'export_last_login' } },
      })
    );

    expect(checkpoint.config.params).toEqual({
      operation: 'export_last_login',
      fields: ['user_id', 'email', 'last_login', 'logins_count'],
    });
  });

  it('should reject invalid JSON', () => {
    expect(() => deserializeCheckpoint('{not json', 'cp.json')).toThrow(/^Malformed checkpoint cp\.json: invalid JSON/);
  });

  it('should list every schema issue with its path', () => {
    try {
      deserializeCheckpoint(JSON.stringify({ created_at: 'yesterday', updated_at: CREATED_AT }), 'cp.json');
      expect.unreachable();
    } catch (error) {
      expect(error).toBeInstanceOf(MalformedCheckpointError);
      if (error instanceof MalformedCheckpointError) {
        expect(error.issues).toContain('operation_type: Required');
        expect(error.issues).toContain('created_at: Invalid ISO timestamp');
      }
    }
  });

  it('should reject an unknown status', () => {
    const json = JSON.stringify({
      operation_type: 'batch_delete',
      status: 'paused',
      created_at: CREATED_AT,
      updated_at: CREATED_AT,
    });
    expect(() => deserializeCheckpoint(json)).toThrow(MalformedCheckpointError);
  });

  it('should reject params for another operation', () => {
    const json = JSON.stringify({
      id: 'cp-1',
      operation_type: 'batch_block',
      created_at: CREATED_AT,
      updated_at: CREATED_AT,
      config: { params: { operation: 'batch_delete' } },
    });
    expect(() => deserializeCheckpoint(json)).toThrow(
      'Malformed checkpoint cp-1: config.params.operation "batch_delete" does not match operation_type "batch_block"'
    );
  });
});

describe('checkpoint files', () => {
  let dir: string;

  beforeEach(async () => {
    dir = await createTempDir();
  });

  afterEach(async () => {
    await removeTempDir(dir);
  });

  it('should save and load a checkpoint', async () => {
    const checkpoint = buildCheckpoint();
    const path = join(dir, 'nested', `${checkpoint.id}.json`);
    await saveCheckpointFile(path, checkpoint, createSilentLogger());

    expect(await checkpointFileExists(path)).toBe(true);
    expect(await loadCheckpointFile(path)).toEqual(checkpoint);
  });

  it('should keep the previous version as a backup', async () => {
    const checkpoint = buildCheckpoint();
    const path = join(dir, 'cp.json');
    await saveCheckpointFile(path, checkpoint, createSilentLogger());
    expect(await checkpointFileExists(`${path}.backup`)).toBe(false);

    checkpoint.progress.currentBatch = 1;
    await saveCheckpointFile(path, checkpoint, createSilentLogger());

    const backup = deserializeCheckpoint(await readFile(`${path}.backup`, 'utf-8'));
    const current = await loadCheckpointFile(path);
    expect(backup.progress.currentBatch).toBe(0);
    expect(current.progress.currentBatch).toBe(1);
  });

  it('should fail with PersistenceError when the directory cannot be created', async () => {
    await writeFile(join(dir, 'blocker'), 'not a directory');

    await expect(
      saveCheckpointFile(join(dir, 'blocker', 'cp.json'), buildCheckpoint(), createSilentLogger())
    ).rejects.toThrow(PersistenceError);
  });

  it('should fail with PersistenceError when the file cannot be written', async () => {
    const path = join(dir, 'cp.json');
    await mkdir(path);

    await expect(saveCheckpointFile(path, buildCheckpoint(), createSilentLogger())).rejects.toThrow(
      /^Failed to write checkpoint/
    );
  });

  it('should report a missing file as not found, using the file name as id', async () => {
    await expect(loadCheckpointFile(join(dir, 'missing-id.json'))).rejects.toThrow(
      new CheckpointNotFoundError('missing-id')
    );
  });

  it('should fill an empty id from the file name', async () => {
    await writeFile(
      join(dir, 'from-file.json'),
      JSON.stringify({ id: '', operation_type: 'batch_delete', created_at: CREATED_AT, updated_at: CREATED_AT })
    );

    expect((await loadCheckpointFile(join(dir, 'from-file.json'))).id).toBe('from-file');
  });
});

describe('derived values', () => {
  it('should compute completion and success rate', () => {
    const checkpoint = buildCheckpoint(['a|1', 'b|2', 'c|3', 'd|4'], 2);
    checkpoint.progress.currentItem = 3;
    checkpoint.results.processedCount = 2;
    checkpoint.results.skippedCount = 1;
    checkpoint.results.errorCount = 1;

    expect(getCompletionPercentage(checkpoint)).toBe(75);
    expect(getSuccessRate(checkpoint)).toBe(50);
  });

  it('should report zero for an empty checkpoint', () => {
    const checkpoint = buildCheckpoint([], 2);

    expect(getCompletionPercentage(checkpoint)).toBe(0);
    expect(getSuccessRate(checkpoint)).toBe(0);
    expect(getResumeBlocker(checkpoint)).toBe('no remaining items');
  });

  it('should explain why a checkpoint cannot resume', () => {
    const completed = buildCheckpoint();
    completed.status = 'completed';
    expect(getResumeBlocker(completed)).toBe('operation already completed');

    const exportCheckpoint = buildCheckpoint();
    exportCheckpoint.operationType = 'export_last_login';
    exportCheckpoint.config.params = { operation: 'export_last_login', fields: ['user_id'] };
    expect(getResumeBlocker(exportCheckpoint)).toBe('export_last_login requires an output file');

    const cancelled = buildCheckpoint();
    cancelled.status = 'cancelled';
    expect(getResumeBlocker(cancelled)).toBeNull();
    expect(isResumable(cancelled)).toBe(true);
  });

  it('should summarise a checkpoint', () => {
    const checkpoint = buildCheckpoint();
    checkpoint.processedItems = ['a|1'];
    checkpoint.remainingItems = ['b|2', 'c|3'];
    checkpoint.progress.currentItem = 1;

    expect(getCheckpointSummary(checkpoint)).toMatchObject({
      id: checkpoint.id,
      operationType: 'batch_delete',
      status: 'active',
      totalItems: 3,
      processedItems: 1,
      remainingItems: 2,
      environment: 'prod',
      inputFile: 'users.txt',
      outputFile: null,
      isResumable: true,
    });
  });
});
