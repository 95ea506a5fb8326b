import { describe, it, expect, beforeEach, vi } from 'vitest';
import { PinoLoggerService } from '../../../src/shared/logging/pino-logger.service';
import { createConfigService } from '../helpers/mock-factories';

const pinoInstance = vi.hoisted(() => ({
  info: vi.fn(),
  warn: vi.fn(),
  error: vi.fn(),
  debug: vi.fn(),
  trace: vi.fn(),
  fatal: vi.fn(),
  flush: vi.fn(),
}));

vi.mock('pino', () => ({ default: vi.fn(() => pinoInstance) }));

describe('PinoLoggerService', () => {
  let service: PinoLoggerService;

  beforeEach(() => {
    vi.clearAllMocks();
    service = new PinoLoggerService(createConfigService());
  });

  it('should write structured lines without a context by default', () => {
    service.info({ taskId: 'T1' }, 'Processing task');

    expect(pinoInstance.info).toHaveBeenCalledWith(
      { taskId: 'T1', context: undefined },
      'Processing task',
    );
  });

  it('should tag lines written through a child with its context', () => {
    const child = service.child('S3Service');

    child.info({ key: 'workfront/a.pdf' }, 'File uploaded successfully');

    expect(pinoInstance.info).toHaveBeenCalledWith(
      { key: 'workfront/a.pdf', context: 'S3Service' },
      'File uploaded successfully',
    );
  });

  it('should leave the root logger context untouched when a child is created', () => {
    service.child('LoggingEventPublisherAdapter');

    service.warn('Interrupt received');

    expect(pinoInstance.warn).toHaveBeenCalledWith({ msg: 'Interrupt received', context: undefined });
  });

  it('should prefer the context passed by a Nest logger over its own', () => {
    service.child('S3Service').log('Workflow started', 'RunSyncUseCase');

    expect(pinoInstance.info).toHaveBeenCalledWith({ msg: 'Workflow started', context: 'RunSyncUseCase' });
  });
});
