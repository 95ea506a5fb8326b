import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest';
import { Logger } from '@nestjs/common';
import { promises as fs } from 'fs';
import * as os from 'os';
import * as path from 'path';
import { ExitCode } from '../../../src/application/ports/input';
import { ProcessDocumentUseCase } from '../../../src/application/use-cases/process-document.use-case';
import { ProcessTaskUseCase } from '../../../src/application/use-cases/process-task.use-case';
import { RunSyncUseCase } from '../../../src/application/use-cases/run-sync.use-case';
import { RemoteError, RunCompletedEvent, SessionCredentialVO } from '../../../src/domain';
import { StagingAreaService } from '../../../src/shared/staging/staging-area.service';
import {
  InMemoryAssetStoreAdapter,
  InMemoryCredentialProvider,
  InMemoryEventPublisherAdapter,
  InMemoryTaskApiAdapter,
} from '../../in-memory-adapters';
import {
  createConfigService,
  createDocument,
  createMockCredentialProvider,
  createMockEventPublisher,
  createMockExecutor,
  createMockTaskApi,
  createTask,
  createTestConfig,
  TEST_CREDENTIAL,
} from '../helpers/mock-factories';

describe('RunSyncUseCase', () => {
  describe('With in-memory adapters', () => {
    let useCase: RunSyncUseCase;
    let taskApi: InMemoryTaskApiAdapter;
    let assetStore: InMemoryAssetStoreAdapter;
    let credentialProvider: InMemoryCredentialProvider;
    let eventPublisher: InMemoryEventPublisherAdapter;
    let stagingRoot: string;

    beforeEach(async () => {
      stagingRoot = await fs.mkdtemp(path.join(os.tmpdir(), 'run-sync-spec-'));

      const baseConfig = createTestConfig();
      const configService = createConfigService(
        createTestConfig({ workflow: { ...baseConfig.workflow, tempDir: stagingRoot } }),
      );

      taskApi = new InMemoryTaskApiAdapter();
      assetStore = new InMemoryAssetStoreAdapter('https://assets.test');
      credentialProvider = new InMemoryCredentialProvider('test-session-id');
      eventPublisher = new InMemoryEventPublisherAdapter();

      const processDocument = new ProcessDocumentUseCase(
        taskApi,
        assetStore,
        eventPublisher,
        new StagingAreaService(configService),
        configService,
      );
      const processTask = new ProcessTaskUseCase(processDocument, eventPublisher, configService);

      useCase = new RunSyncUseCase(
        credentialProvider,
        taskApi,
        processTask,
        eventPublisher,
        configService,
      );
    });

    afterEach(async () => {
      await fs.rm(stagingRoot, { recursive: true, force: true });
    });

    it('should complete a task when every document uploads', async () => {
      taskApi.seedTasks(createTask('T1', [createDocument('A', 'a.pdf'), createDocument('B', 'b.pdf')]));
      taskApi.seedDocument('A', Buffer.from('alpha'));
      taskApi.seedDocument('B', Buffer.from('bravo'));

      const result = await useCase.execute();

      expect(result.exitCode).toBe(ExitCode.SUCCESS);
      expect(taskApi.statusOf('T1')).toBe('CPL');
      expect(taskApi.documentFieldUpdates.get('A')).toEqual({
        description: 'https://assets.test/workfront/A',
      });
      expect(taskApi.documentFieldUpdates.get('B')).toEqual({
        description: 'https://assets.test/workfront/B',
      });
      expect(assetStore.getAsset('workfront/A')?.contents.toString()).toBe('alpha');
      expect(assetStore.getAsset('workfront/B')?.contents.toString()).toBe('bravo');
    });

    it('should mark a task as failed and keep sibling links when one upload fails', async () => {
      taskApi.seedTasks(createTask('T2', [createDocument('A2'), createDocument('B2')]));
      assetStore.failUploadFor.add('A2');

      const result = await useCase.execute();

      expect(result.exitCode).toBe(ExitCode.FAILURE);
      expect(taskApi.statusOf('T2')).toBe('ERR');
      expect(taskApi.documentFieldUpdates.has('A2')).toBe(false);
      expect(taskApi.documentFieldUpdates.get('B2')).toEqual({
        description: 'https://assets.test/workfront/B2',
      });
      expect(result.statistics.toJSON()).toEqual({
        totalTasks: 1,
        successfulTasks: 0,
        failedTasks: 1,
        totalDocuments: 2,
        skippedTasks: 0,
      });
    });

    it('should not search for tasks when the credential cannot be issued', async () => {
      credentialProvider.reject('Token exchange rejected with HTTP 401');
      taskApi.seedTasks(createTask('T1', [createDocument('A')]));

      const result = await useCase.execute();

      expect(result.exitCode).toBe(ExitCode.FAILURE);
      expect(taskApi.searchCalls).toEqual([]);
      expect(taskApi.taskStatusUpdates).toEqual([]);
    });

    it('should skip tasks without documents and leave their status untouched', async () => {
      taskApi.seedTasks(
        createTask('T1', [createDocument('A')]),
        createTask('T2', []),
        createTask('T3', [createDocument('B')]),
        createTask('T4', []),
        createTask('T5', [createDocument('C'), createDocument('D')]),
      );

      const result = await useCase.execute();

      expect(result.exitCode).toBe(ExitCode.SUCCESS);
      expect(result.statistics.totalTasks).toBe(3);
      expect(result.statistics.skippedTasks).toBe(2);
      expect(result.statistics.totalDocuments).toBe(4);
      expect(taskApi.taskStatusUpdates.map((update) => update.taskId)).toEqual(['T1', 'T3', 'T5']);
      expect(taskApi.statusOf('T2')).toBeUndefined();
      expect(taskApi.statusOf('T4')).toBeUndefined();
    });

    it('should search once for the ready status with documents and the run limit', async () => {
      await useCase.execute();

      expect(taskApi.searchCalls).toEqual([
        { statusCode: 'UPL', limit: 100, includeDocuments: true },
      ]);
    });

    it('should succeed with empty statistics when no task is waiting', async () => {
      const result = await useCase.execute();

      expect(result.exitCode).toBe(ExitCode.SUCCESS);
      expect(result.interrupted).toBe(false);
      expect(result.statistics.toJSON()).toEqual({
        totalTasks: 0,
        successfulTasks: 0,
        failedTasks: 0,
        totalDocuments: 0,
        skippedTasks: 0,
      });
    });

    it('should exit with failure when the task search fails', async () => {
      taskApi.failSearchWith(new RemoteError('Task search failed with HTTP 503', 503));

      const result = await useCase.execute();

      expect(result.exitCode).toBe(ExitCode.FAILURE);
      expect(taskApi.downloads).toEqual([]);
    });

    it('should continue with the next task after one fails', async () => {
      taskApi.seedTasks(
        createTask('T1', [createDocument('A')]),
        createTask('T2', [createDocument('B')]),
      );
      taskApi.failDownloadFor.add('A');

      const result = await useCase.execute();

      expect(taskApi.statusOf('T1')).toBe('ERR');
      expect(taskApi.statusOf('T2')).toBe('CPL');
      expect(result.statistics.successfulTasks).toBe(1);
      expect(result.statistics.failedTasks).toBe(1);
      expect(result.exitCode).toBe(ExitCode.FAILURE);
    });

    it('should count a task as failed when its status update is rejected', async () => {
      taskApi.seedTasks(createTask('T1', [createDocument('A')]));
      taskApi.failTaskUpdateFor.add('T1');

      const result = await useCase.execute();

      expect(result.exitCode).toBe(ExitCode.FAILURE);
      expect(result.statistics.failedTasks).toBe(1);
      expect(taskApi.documentFieldUpdates.get('A')).toEqual({
        description: 'https://assets.test/workfront/A',
      });
    });

    it('should stop before the next task once interrupted', async () => {
      const controller = new AbortController();
      taskApi.seedTasks(createTask('T1', [createDocument('A')]));
      controller.abort();

      const result = await useCase.execute({ signal: controller.signal });

      expect(result.exitCode).toBe(ExitCode.INTERRUPTED);
      expect(result.interrupted).toBe(true);
      expect(taskApi.downloads).toEqual([]);
      expect(taskApi.taskStatusUpdates).toEqual([]);
    });

    it('should publish a run completed event with the statistics', async () => {
      taskApi.seedTasks(createTask('T1', [createDocument('A')]));

      await useCase.execute();

      expect(eventPublisher.getEventNames()).toEqual([
        'document.uploaded',
        'task.completed',
        'run.completed',
      ]);
      const runEvent = eventPublisher.getPublishedEvents()[2];
      expect(runEvent).toBeInstanceOf(RunCompletedEvent);
      expect(runEvent.toJSON()).toMatchObject({
        payload: {
          exitCode: 0,
          interrupted: false,
          statistics: { totalTasks: 1, successfulTasks: 1, failedTasks: 0 },
        },
      });
    });
  });

  describe('With mocked ports', () => {
    let useCase: RunSyncUseCase;
    let mockCredentialProvider: ReturnType<typeof createMockCredentialProvider>;
    let mockTaskApi: ReturnType<typeof createMockTaskApi>;
    let mockProcessTask: ReturnType<typeof createMockExecutor>;
    let mockEventPublisher: ReturnType<typeof createMockEventPublisher>;

    beforeEach(() => {
      mockCredentialProvider = createMockCredentialProvider();
      mockTaskApi = createMockTaskApi();
      mockProcessTask = createMockExecutor();
      mockEventPublisher = createMockEventPublisher();

      mockCredentialProvider.issueSessionCredential.mockResolvedValue(TEST_CREDENTIAL);
      mockTaskApi.updateTaskStatus.mockResolvedValue(200);

      useCase = new RunSyncUseCase(
        mockCredentialProvider,
        mockTaskApi,
        mockProcessTask,
        mockEventPublisher,
        createConfigService(),
      );
    });

    it('should build the credential request from the auth settings', async () => {
      mockTaskApi.searchTasks.mockResolvedValue([]);

      await useCase.execute();

      expect(mockCredentialProvider.issueSessionCredential).toHaveBeenCalledWith({
        identity: { instance: 'acme', clientId: 'test-client-id', clientSecret: 'test-secret' },
        signingKey: 'test-private-key',
        issuer: 'test-customer',
        subject: 'test-user',
      });
    });

    it('should persist the error status when task processing throws', async () => {
      mockTaskApi.searchTasks.mockResolvedValue([createTask('T1', [createDocument('A')])]);
      mockProcessTask.execute.mockRejectedValue(new Error('unexpected'));

      const result = await useCase.execute();

      expect(mockTaskApi.updateTaskStatus).toHaveBeenCalledWith('T1', 'ERR');
      expect(result.statistics.failedTasks).toBe(1);
      expect(result.exitCode).toBe(ExitCode.FAILURE);
    });

    it('should still finish the run when marking a task failed also fails', async () => {
      mockTaskApi.searchTasks.mockResolvedValue([
        createTask('T1', [createDocument('A')]),
        createTask('T2', [createDocument('B')]),
      ]);
      mockProcessTask.execute
        .mockRejectedValueOnce(new Error('unexpected'))
        .mockResolvedValueOnce('CPL');
      mockTaskApi.updateTaskStatus
        .mockRejectedValueOnce(new RemoteError('Update of task T1 failed with HTTP 500', 500))
        .mockResolvedValue(200);

      const result = await useCase.execute();

      expect(mockTaskApi.updateTaskStatus).toHaveBeenNthCalledWith(1, 'T1', 'ERR');
      expect(mockTaskApi.updateTaskStatus).toHaveBeenNthCalledWith(2, 'T2', 'CPL');
      expect(result.statistics.successfulTasks).toBe(1);
      expect(result.statistics.failedTasks).toBe(1);
    });

    it('should stop between tasks when the signal aborts mid-run', async () => {
      const controller = new AbortController();
      mockTaskApi.searchTasks.mockResolvedValue([
        createTask('T1', [createDocument('A')]),
        createTask('T2', [createDocument('B')]),
      ]);
      mockProcessTask.execute.mockImplementation(async () => {
        controller.abort();
        return 'CPL';
      });

      const result = await useCase.execute({ signal: controller.signal });

      expect(result.exitCode).toBe(ExitCode.INTERRUPTED);
      expect(mockProcessTask.execute).toHaveBeenCalledTimes(1);
      expect(mockTaskApi.updateTaskStatus).toHaveBeenCalledWith('T1', 'CPL');
      expect(result.statistics.successfulTasks).toBe(1);
    });

    it('should report an interrupt that lands during the only task', async () => {
      const controller = new AbortController();
      mockTaskApi.searchTasks.mockResolvedValue([createTask('T1', [createDocument('A')])]);
      mockProcessTask.execute.mockImplementation(async () => {
        controller.abort();
        return 'CPL';
      });

      const result = await useCase.execute({ signal: controller.signal });

      expect(result.exitCode).toBe(ExitCode.INTERRUPTED);
      expect(result.interrupted).toBe(true);
      expect(mockTaskApi.updateTaskStatus).toHaveBeenCalledWith('T1', 'CPL');
      expect(result.statistics.successfulTasks).toBe(1);
    });

    it('should report an interrupt that lands during a search that finds nothing', async () => {
      const controller = new AbortController();
      mockTaskApi.searchTasks.mockImplementation(async () => {
        controller.abort();
        return [];
      });

      const result = await useCase.execute({ signal: controller.signal });

      expect(result.exitCode).toBe(ExitCode.INTERRUPTED);
      expect(result.interrupted).toBe(true);
    });

    it('should not search once interrupted during credential issuance', async () => {
      const controller = new AbortController();
      mockCredentialProvider.issueSessionCredential.mockImplementation(async () => {
        controller.abort();
        return TEST_CREDENTIAL;
      });

      const result = await useCase.execute({ signal: controller.signal });

      expect(result.exitCode).toBe(ExitCode.INTERRUPTED);
      expect(mockTaskApi.searchTasks).not.toHaveBeenCalled();
    });

    it('should keep the interrupt exit code when the last task fails', async () => {
      const controller = new AbortController();
      mockTaskApi.searchTasks.mockResolvedValue([createTask('T1', [createDocument('A')])]);
      mockProcessTask.execute.mockImplementation(async () => {
        controller.abort();
        return 'ERR';
      });

      const result = await useCase.execute({ signal: controller.signal });

      expect(result.exitCode).toBe(ExitCode.INTERRUPTED);
      expect(result.statistics.failedTasks).toBe(1);
    });

    it('should warn but still process tasks with an expired credential', async () => {
      mockCredentialProvider.issueSessionCredential.mockResolvedValue(
        SessionCredentialVO.create('test-session-id', new Date('2020-01-01T00:00:00Z'), 60),
      );
      mockTaskApi.searchTasks.mockResolvedValue([createTask('T1', [createDocument('A')])]);
      mockProcessTask.execute.mockResolvedValue('CPL');
      const warnSpy = vi.spyOn(Logger.prototype, 'warn');

      const result = await useCase.execute();

      expect(warnSpy).toHaveBeenCalledWith(
        'Session credential expired at 2020-01-01T00:01:00.000Z; downloads for task T1 may be rejected',
      );
      expect(mockProcessTask.execute).toHaveBeenCalledTimes(1);
      expect(result.exitCode).toBe(ExitCode.SUCCESS);
      warnSpy.mockRestore();
    });
  });
});
