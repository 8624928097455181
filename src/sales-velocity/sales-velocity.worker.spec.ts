import { createTestServices } from '../../test/test-services';
import { SalesVelocityWorker } from './sales-velocity.worker';

const setup = (workerEnabled: boolean) => {
  const services = createTestServices({
    salesVelocity: { workerEnabled, workerIntervalMs: 1000 },
  });
  const aggregate = jest.spyOn(
    services.salesVelocityService,
    'aggregatePendingSales',
  );
  const worker = new SalesVelocityWorker(
    services.salesVelocityService,
    services.config,
  );
  return { aggregate, worker };
};

describe('SalesVelocityWorker', () => {
  afterEach(() => {
    jest.useRealTimers();
  });

  it('aggregates on every interval while enabled', () => {
    jest.useFakeTimers();
    const { aggregate, worker } = setup(true);

    worker.onModuleInit();
    jest.advanceTimersByTime(1000);
    worker.onModuleDestroy();
    jest.advanceTimersByTime(5000);

    expect(aggregate).toHaveBeenCalledTimes(1);
  });

  it('stays idle when disabled', () => {
    jest.useFakeTimers();
    const { aggregate, worker } = setup(false);

    worker.onModuleInit();
    jest.advanceTimersByTime(5000);

    expect(aggregate).not.toHaveBeenCalled();
  });

  it('never overlaps runs', async () => {
    const { aggregate, worker } = setup(false);
    let finish: () => void = () => undefined;
    aggregate.mockImplementationOnce(
      () =>
        new Promise((resolve) => {
          finish = () => resolve({ batches: 0, scanned: 0, applied: 0 });
        }),
    );

    const first = worker.tick();
    await worker.tick();
    finish();
    await first;

    expect(aggregate).toHaveBeenCalledTimes(1);
  });

  it('logs a failed run instead of throwing', async () => {
    const { aggregate, worker } = setup(false);
    aggregate.mockRejectedValueOnce(new Error('connection refused'));

    await expect(worker.tick()).resolves.toBeUndefined();
    expect(aggregate).toHaveBeenCalledTimes(1);
  });
});
