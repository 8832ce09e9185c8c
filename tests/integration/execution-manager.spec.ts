import { EventEmitter2 } from '@nestjs/event-emitter';
import { ExecutionAlreadyExistsError } from '../../src/errors/execution-already-exists.error';
import { ExecutionNotFoundError } from '../../src/errors/execution-not-found.error';
import { StateMachineNotFoundError } from '../../src/errors/state-machine-not-found.error';
import { StateMachineEventType } from '../../src/events/state-machine-event-type.enum';
import type { AslDocument } from '../../src/interfaces/asl-document.interface';
import type { JsonValue } from '../../src/interfaces/json.interface';
import { LocalResourceInvoker } from '../../src/invokers/local-resource.invoker';
import { ExecutionManager } from '../../src/services/execution-manager.service';
import { InMemoryExecutionStore } from '../../src/stores/in-memory-execution.store';
import {
  createDeferred,
  createMockRegistry,
  createResolvedOptions,
  type Deferred,
  flushPromises,
  VirtualScheduler,
} from '../helpers';

const EXECUTION_PREFIX = 'arn:aws:states:us-east-1:000000000000:execution:';

const orderFlow: AslDocument = {
  StartAt: 'Price',
  States: {
    Price: { Type: 'Task', Resource: 'price', ResultPath: '$.price', Next: 'Done' },
    Done: { Type: 'Succeed' },
  },
};

const blockingFlow: AslDocument = {
  StartAt: 'Block',
  States: { Block: { Type: 'Task', Resource: 'block', End: true } },
};

const rejectingFlow: AslDocument = {
  StartAt: 'Reject',
  States: { Reject: { Type: 'Fail', Error: 'Order.Rejected', Cause: 'Out of stock' } },
};

describe('ExecutionManager', () => {
  let manager: ExecutionManager;
  let store: InMemoryExecutionStore;
  let eventEmitter: EventEmitter2;
  let blocked: Deferred<JsonValue>;

  beforeEach(() => {
    blocked = createDeferred<JsonValue>();
    const registry = createMockRegistry();
    registry.register({ name: 'orders', definition: orderFlow }, 'OrdersFlow');
    registry.register(
      { name: 'orders-express', definition: orderFlow, type: 'EXPRESS' },
      'OrdersFlow',
    );
    registry.register({ name: 'blocking', definition: blockingFlow }, 'BlockingFlow');
    registry.register({ name: 'rejecting', definition: rejectingFlow }, 'RejectingFlow');

    store = new InMemoryExecutionStore();
    eventEmitter = new EventEmitter2();
    const invoker = new LocalResourceInvoker({
      price: () => 42,
      block: () => blocked.promise,
    });
    manager = new ExecutionManager(
      registry,
      store,
      invoker,
      eventEmitter,
      createResolvedOptions(),
      new VirtualScheduler(),
    );
  });

  afterEach(async () => {
    await manager.onModuleDestroy();
  });

  describe('starting executions', () => {
    it('should block on an EXPRESS machine and return its output', async () => {
      const result = await manager.startExecution('orders-express', { sku: 'A-1' }, {
        name: 'first',
      });

      expect(result).toMatchObject({
        executionId: `${EXECUTION_PREFIX}orders-express:first`,
        status: 'SUCCEEDED',
        output: { sku: 'A-1', price: 42 },
      });
    });

    it('should start a STANDARD machine in the background', async () => {
      const started = await manager.startExecution('orders', { sku: 'A-1' }, { name: 'bg' });

      expect(started).toEqual({
        executionId: `${EXECUTION_PREFIX}orders:bg`,
        startedAt: expect.any(Date),
      });

      const view = await manager.awaitExecution(started.executionId);
      expect(view.status).toBe('SUCCEEDED');
      expect(view.output).toEqual({ sku: 'A-1', price: 42 });
      await expect(manager.listHistory(started.executionId)).resolves.toHaveLength(2);
    });

    it('should generate a unique name when none is given', async () => {
      const first = await manager.startSync('orders', {});
      const second = await manager.startSync('orders', {});

      expect(first.executionId).toMatch(new RegExp(`^${EXECUTION_PREFIX}orders:`));
      expect(first.executionId).not.toBe(second.executionId);
    });

    it('should return the error of a failed synchronous execution', async () => {
      const result = await manager.startSync('rejecting', {});

      expect(result).toMatchObject({
        status: 'FAILED',
        error: 'Order.Rejected',
        cause: 'Out of stock',
      });
    });

    it('should reject a name that was already used', async () => {
      await manager.startSync('orders', {}, { name: 'once' });

      await expect(manager.startSync('orders', {}, { name: 'once' })).rejects.toBeInstanceOf(
        ExecutionAlreadyExistsError,
      );
    });

    it('should reject an unknown state machine', async () => {
      await expect(manager.startExecution('missing', {})).rejects.toBeInstanceOf(
        StateMachineNotFoundError,
      );
    });

    it('should emit the completion event', async () => {
      const listener = jest.fn();
      eventEmitter.on(StateMachineEventType.EXECUTION_SUCCEEDED, listener);

      await manager.startSync('orders', {}, { name: 'evented' });

      expect(listener).toHaveBeenCalledWith(
        expect.objectContaining({
          executionId: `${EXECUTION_PREFIX}orders:evented`,
          stateMachineName: 'orders',
          status: 'SUCCEEDED',
        }),
      );
    });
  });

  describe('querying', () => {
    it('should throw for an unknown execution', async () => {
      await expect(manager.describe('missing')).rejects.toBeInstanceOf(ExecutionNotFoundError);
    });

    it('should list executions by state machine and status', async () => {
      await manager.startSync('orders', {}, { name: 'ok' });
      await manager.startSync('rejecting', {}, { name: 'bad' });
      await manager.startAsync('blocking', {}, { name: 'busy' });

      const failed = await manager.listExecutions({ status: 'FAILED' });
      expect(failed.map((r) => r.executionId)).toEqual([`${EXECUTION_PREFIX}rejecting:bad`]);

      const running = await manager.listExecutions({ status: 'RUNNING' });
      expect(running.map((r) => r.stateMachineName)).toEqual(['blocking']);

      const orders = await manager.listExecutions({ stateMachineName: 'orders' });
      expect(orders).toHaveLength(1);
    });
  });

  describe('stopping', () => {
    it('should abort a running execution with the given error and cause', async () => {
      const { executionId } = await manager.startAsync('blocking', {}, { name: 'stop-me' });
      await flushPromises();

      const view = await manager.stop(executionId, {
        error: 'Ops.Stop',
        cause: 'Stopped by operator',
      });

      expect(view).toMatchObject({
        status: 'ABORTED',
        error: 'Ops.Stop',
        cause: 'Stopped by operator',
      });
      expect(view.stoppedAt).toBeInstanceOf(Date);
    });

    it('should end a stopped synchronous execution as ABORTED', async () => {
      const executionId = `${EXECUTION_PREFIX}blocking:sync`;
      const running = manager.startSync('blocking', {}, { name: 'sync' });
      await flushPromises();

      await manager.stop(executionId);

      await expect(running).resolves.toMatchObject({
        status: 'ABORTED',
        error: 'States.Cancelled',
        cause: 'Execution was stopped',
      });
    });

    it('should leave a finished execution unchanged', async () => {
      const { executionId } = await manager.startSync('orders', {}, { name: 'done' });

      const view = await manager.stop(executionId, { error: 'Too.Late' });

      expect(view.status).toBe('SUCCEEDED');
      expect(view.error).toBeUndefined();
    });

    it('should abort everything still running on module destroy', async () => {
      const { executionId } = await manager.startAsync('blocking', {}, { name: 'shutdown' });
      await flushPromises();

      await manager.onModuleDestroy();

      const view = await manager.describe(executionId);
      expect(view).toMatchObject({
        status: 'ABORTED',
        error: 'States.Cancelled',
        cause: 'Module is shutting down',
      });
    });

    it('should let a blocked task finish when not stopped', async () => {
      const { executionId } = await manager.startAsync('blocking', {}, { name: 'finish' });
      await flushPromises();

      blocked.resolve({ released: true });
      const view = await manager.awaitExecution(executionId);

      expect(view.status).toBe('SUCCEEDED');
      expect(view.output).toEqual({ released: true });
    });
  });
});
