/**
 * Tests for CheckpointManager
 */

import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { readdir, writeFile } from 'node:fs/promises';
import { join } from 'node:path';
import {
  CheckpointManager,
  createEmptyResults,
  createOperationConfig,
  type Checkpoint,
  type OperationConfig,
} from '../../lib/src/checkpoint/index.js';
import { ValidationError } from '../../lib/src/errors/index.js';
import { createCapturingLogger, createSilentLogger, createTempDir, removeTempDir } from '../helpers.js';

const deleteConfig = (overrides: Partial<Omit<OperationConfig, 'params'>> = {}): OperationConfig =>
  createOperationConfig({ operation: 'batch_delete', revokeSessions: false }, overrides);

describe('CheckpointManager', () => {
  let dir: string;
  let clock: Date;
  let manager: CheckpointManager;

  beforeEach(async () => {
    dir = await createTempDir();
    clock = new Date('2024-03-05T10:00:00.000Z');
    manager = new CheckpointManager({ directory: dir, logger: createSilentLogger(), now: () => clock });
  });

  afterEach(async () => {
    await removeTempDir(dir);
  });

  describe('generateCheckpointId', () => {
    it('should combine operation, environment, timestamp and a random suffix', () => {
      const id = manager.generateCheckpointId('batch_block', 'prod');

      expect(id).toMatch(/^batch_block_prod_\d{8}_\d{6}_[0-9a-f]{8}$/);
      expect(manager.generateCheckpointId('batch_block', 'prod')).not.toBe(id);
    });

    it('should place checkpoints in the directory as JSON files', () => {
      expect(manager.getCheckpointPath('cp-1')).toBe(join(dir, 'cp-1.json'));
    });
  });

  describe('createCheckpoint', () => {
    it('should start an active checkpoint with all items remaining', () => {
      const checkpoint = manager.createCheckpoint('batch_delete', deleteConfig(), ['a|1', 'b|2', 'c|3'], 2);

      expect(checkpoint.status).toBe('active');
      expect(checkpoint.version).toBe('1.0.0');
      expect(checkpoint.createdAt).toBe('2024-03-05T10:00:00.000Z');
      expect(checkpoint.progress).toEqual({
        currentBatch: 0,
        totalBatches: 2,
        currentItem: 0,
        totalItems: 3,
        batchSize: 2,
      });
      expect(checkpoint.remainingItems).toEqual(['a|1', 'b|2', 'c|3']);
      expect(checkpoint.processedItems).toEqual([]);
      expect(checkpoint.results).toEqual(createEmptyResults());
    });

    it('should drop duplicates, keeping the first occurrence', () => {
      const { logger, lines } = createCapturingLogger();
      const withLogger = new CheckpointManager({ directory: dir, logger, now: () => clock });
      const checkpoint = withLogger.createCheckpoint('batch_delete', deleteConfig(), ['b|2', 'a|1', 'b|2', 'c|3'], 10);

      expect(checkpoint.remainingItems).toEqual(['b|2', 'a|1', 'c|3']);
      expect(checkpoint.progress.totalItems).toBe(3);
      expect(lines).toEqual([
        'WARN  Dropped duplicate identifiers from input {"operationType":"batch_delete","duplicates":1}',
      ]);
    });

    it('should accept an empty item list', () => {
      const checkpoint = manager.createCheckpoint('batch_delete', deleteConfig(), [], 5);

      expect(checkpoint.progress.totalBatches).toBe(0);
      expect(checkpoint.remainingItems).toEqual([]);
    });

    it('should reject a batch size below one', () => {
      expect(() => manager.createCheckpoint('batch_delete', deleteConfig(), ['a|1'], 0)).toThrow(
        new ValidationError('Batch size must be a positive integer, got 0')
      );
      expect(() => manager.createCheckpoint('batch_delete', deleteConfig(), ['a|1'], 1.5)).toThrow(ValidationError);
    });

    it('should reject params for another operation', () => {
      expect(() => manager.createCheckpoint('batch_block', deleteConfig(), ['a|1'], 1)).toThrow(
        'Operation params are for batch_delete, not batch_block'
      );
    });

    it('should require an output file for exports', () => {
      const config = createOperationConfig({ operation: 'export_last_login', fields: ['user_id'] });

      expect(() => manager.createCheckpoint('export_last_login', config, ['a@example.com'], 1)).toThrow(
        'export_last_login requires an output file'
      );
    });
  });

  describe('create, save and load', () => {
    it('should persist a new checkpoint and load it back', async () => {
      const id = await manager.create(['a|1', 'b|2'], deleteConfig({ environment: 'prod' }), 1);
      const loaded = await manager.load(id);

      expect(loaded?.id).toBe(id);
      expect(loaded?.operationType).toBe('batch_delete');
      expect(loaded?.config.environment).toBe('prod');
      expect(loaded?.remainingItems).toEqual(['a|1', 'b|2']);
    });

    it('should return null for an unknown id', async () => {
      expect(await manager.load('nope')).toBeNull();
    });

    it('should stamp updatedAt on save', async () => {
      const checkpoint = manager.createCheckpoint('batch_delete', deleteConfig(), ['a|1'], 1);
      clock = new Date('2024-03-05T11:00:00.000Z');
      await manager.save(checkpoint);

      expect(checkpoint.updatedAt).toBe('2024-03-05T11:00:00.000Z');
      expect((await manager.load(checkpoint.id))?.updatedAt).toBe('2024-03-05T11:00:00.000Z');
    });
  });

  describe('list', () => {
    async function createAt(iso: string, environment: string, status?: Checkpoint['status']): Promise<string> {
      clock = new Date(iso);
      const checkpoint = manager.createCheckpoint('batch_delete', deleteConfig({ environment }), ['a|1'], 1);
      if (status) {
        checkpoint.status = status;
      }
      await manager.save(checkpoint);
      return checkpoint.id;
    }

    it('should return an empty list when the directory does not exist', async () => {
      const missing = new CheckpointManager({ directory: join(dir, 'missing'), logger: createSilentLogger() });
      expect(await missing.list()).toEqual([]);
    });

    it('should list newest first and apply filters', async () => {
      const oldest = await createAt('2024-01-01T00:00:00.000Z', 'dev', 'completed');
      const newest = await createAt('2024-03-01T00:00:00.000Z', 'prod');
      const middle = await createAt('2024-02-01T00:00:00.000Z', 'dev', 'failed');

      expect((await manager.list()).map((checkpoint) => checkpoint.id)).toEqual([newest, middle, oldest]);
      expect((await manager.list({ environment: 'dev' })).map((checkpoint) => checkpoint.id)).toEqual([middle, oldest]);
      expect((await manager.list({ status: 'failed' })).map((checkpoint) => checkpoint.id)).toEqual([middle]);
      expect(await manager.list({ operationType: 'batch_block' })).toEqual([]);
    });

    it('should skip unreadable files and ignore other files', async () => {
      const { logger, lines } = createCapturingLogger();
      const withLogger = new CheckpointManager({ directory: dir, logger, now: () => clock });
      const id = await withLogger.create(['a|1'], deleteConfig(), 1);
      await writeFile(join(dir, 'broken.json'), '{');
      await writeFile(join(dir, 'notes.txt'), 'hello');
      lines.length = 0;

      const listed = await withLogger.list();

      expect(listed.map((checkpoint) => checkpoint.id)).toEqual([id]);
      expect(lines).toHaveLength(1);
      expect(lines[0]).toMatch(/^WARN {2}Skipping unreadable checkpoint file \{"file":"broken\.json"/);
    });

    it('should summarise checkpoints', async () => {
      await createAt('2024-01-01T00:00:00.000Z', 'dev');
      const [summary] = await manager.listSummaries();

      expect(summary).toMatchObject({ totalItems: 1, remainingItems: 1, isResumable: true });
    });
  });

  describe('delete', () => {
    it('should remove the checkpoint and its backup', async () => {
      const checkpoint = manager.createCheckpoint('batch_delete', deleteConfig(), ['a|1'], 1);
      await manager.save(checkpoint);
      await manager.save(checkpoint);
      expect(await readdir(dir)).toHaveLength(2);

      expect(await manager.delete(checkpoint.id)).toBe(true);
      expect(await readdir(dir)).toEqual([]);
      expect(await manager.delete(checkpoint.id)).toBe(false);
    });
  });

  describe('applyBatchUpdate', () => {
    it('should move attempted items and merge results', () => {
      const checkpoint = manager.createCheckpoint('batch_delete', deleteConfig(), ['a|1', 'b|2', 'c|3'], 2);
      manager.applyBatchUpdate(checkpoint, ['a|1', 'b|2'], {
        ...createEmptyResults(),
        processedCount: 1,
        notFoundCount: 1,
        notFoundItems: ['b|2'],
      });

      expect(checkpoint.progress.currentBatch).toBe(1);
      expect(checkpoint.progress.currentItem).toBe(2);
      expect(checkpoint.processedItems).toEqual(['a|1', 'b|2']);
      expect(checkpoint.remainingItems).toEqual(['c|3']);
      expect(checkpoint.results.processedCount).toBe(1);
      expect(checkpoint.results.notFoundItems).toEqual(['b|2']);
      expect(checkpoint.status).toBe('active');
      expect(checkpoint.processedItems.length + checkpoint.remainingItems.length).toBe(checkpoint.progress.totalItems);
    });

    it('should complete the checkpoint with the last batch', () => {
      const checkpoint = manager.createCheckpoint('batch_delete', deleteConfig(), ['a|1'], 1);
      manager.applyBatchUpdate(checkpoint, ['a|1'], { ...createEmptyResults(), processedCount: 1 });

      expect(checkpoint.status).toBe('completed');
      expect(checkpoint.remainingItems).toEqual([]);
    });
  });

  describe('status transitions', () => {
    it('should record a failure without an item', () => {
      const checkpoint = manager.createCheckpoint('batch_delete', deleteConfig(), ['a|1'], 1);
      manager.markFailed(checkpoint, new Error('disk full'));

      expect(checkpoint.status).toBe('failed');
      expect(checkpoint.results.errorCount).toBe(1);
      expect(checkpoint.results.errors).toEqual([
        { item: null, error: 'disk full', timestamp: '2024-03-05T10:00:00.000Z', operation: 'batch_delete' },
      ]);
    });

    it('should record a cancellation reason without counting an error', () => {
      const checkpoint = manager.createCheckpoint('batch_delete', deleteConfig(), ['a|1'], 1);
      manager.markCancelled(checkpoint);

      expect(checkpoint.status).toBe('cancelled');
      expect(checkpoint.results.errorCount).toBe(0);
      expect(checkpoint.results.errors[0]?.error).toBe('Operation cancelled by user');
    });

    it('should reactivate failed and cancelled checkpoints only', async () => {
      const checkpoint = manager.createCheckpoint('batch_delete', deleteConfig(), ['a|1'], 1);
      expect(await manager.reactivate(checkpoint)).toBe(false);

      manager.markCancelled(checkpoint);
      expect(await manager.reactivate(checkpoint)).toBe(true);
      expect(checkpoint.status).toBe('active');
      expect((await manager.load(checkpoint.id))?.status).toBe('active');

      checkpoint.status = 'completed';
      expect(await manager.reactivate(checkpoint)).toBe(false);
      expect(checkpoint.status).toBe('completed');
    });

    it('should finalize and persist', async () => {
      const checkpoint = manager.createCheckpoint('batch_delete', deleteConfig(), [], 1);
      await manager.finalize(checkpoint);

      expect((await manager.load(checkpoint.id))?.status).toBe('completed');
    });
  });

  describe('prune', () => {
    let completedOld: string;
    let failedOld: string;
    let activeOld: string;
    let completedRecent: string;

    async function createAt(iso: string, status: Checkpoint['status']): Promise<string> {
      clock = new Date(iso);
      const checkpoint = manager.createCheckpoint('batch_delete', deleteConfig(), ['a|1'], 1);
      checkpoint.status = status;
      await manager.save(checkpoint);
      return checkpoint.id;
    }

    beforeEach(async () => {
      completedOld = await createAt('2024-01-01T00:00:00.000Z', 'completed');
      failedOld = await createAt('2024-01-02T00:00:00.000Z', 'failed');
      activeOld = await createAt('2024-01-03T00:00:00.000Z', 'active');
      completedRecent = await createAt('2024-03-01T00:00:00.000Z', 'completed');
      clock = new Date('2024-03-05T00:00:00.000Z');
    });

    it('should delete stopped checkpoints older than 30 days by default', async () => {
      const result = await manager.prune({ scope: 'older_than' });

      expect(result).toEqual({ count: 2, ids: [failedOld, completedOld], dryRun: false });
      expect((await manager.list()).map((checkpoint) => checkpoint.id)).toEqual([completedRecent, activeOld]);
    });

    it('should honour a custom age', async () => {
      const result = await manager.prune({ scope: 'older_than', days: 1 });
      expect(result.ids).toEqual([completedRecent, failedOld, completedOld]);
    });

    it('should delete by status', async () => {
      expect((await manager.prune({ scope: 'failed' })).ids).toEqual([failedOld]);
      expect((await manager.prune({ scope: 'completed' })).ids).toEqual([completedRecent, completedOld]);
      expect((await manager.list()).map((checkpoint) => checkpoint.id)).toEqual([activeOld]);
    });

    it('should delete everything with scope all', async () => {
      expect((await manager.prune({ scope: 'all' })).count).toBe(4);
      expect(await manager.list()).toEqual([]);
    });

    it('should only report in dry-run mode', async () => {
      const result = await manager.prune({ scope: 'all' }, { dryRun: true });

      expect(result).toMatchObject({ count: 4, dryRun: true });
      expect(await manager.list()).toHaveLength(4);
    });
  });
});
