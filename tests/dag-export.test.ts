import { Operator } from '../lib/opgraph/src/operator/operator';
import { defineForward } from '../lib/opgraph/src/operator/forward';
import { exportDag, exportOperator, exportTree } from '../lib/opgraph/src/bridge/export';
import { lookupComms, lookupDocumentation } from '../lib/opgraph/src/bridge/metadata';
import { LogLevel } from '../lib/opgraph/src/types/logger';
import { AcyclicityViolation } from '../lib/opgraph/src/utils/operator-error';
import { TestLoggerAdapter } from './utils/test-logger-adapter';

class Tokenizer extends Operator {
  static description = 'Splits text into tokens';
}

class Scheduled extends Operator {
  comms(): Readonly<Record<string, unknown>> {
    return { queue: 'cpu', pool: 'default' };
  }
}

class Flaky extends Operator {
  comms(): Readonly<Record<string, unknown>> {
    throw new Error('backend down');
  }
}

class Undocumented extends Operator {}

describe('exportOperator', () => {
  let logger: TestLoggerAdapter;

  beforeEach(() => {
    logger = new TestLoggerAdapter();
  });

  it('should build a task with disabled notification fields', () => {
    const forward = defineForward(['text'], ({ text }) => String(text).split(' '));
    const op = new Tokenizer({ description: 'Whitespace tokenizer', forward });

    expect(exportOperator(op, { logger })).toEqual({
      kind: 'CallableTask',
      taskId: 'Tokenizer',
      callable: forward,
      upstreamTaskIds: [],
      executionTimeout: null,
      sla: null,
      docRst: 'Whitespace tokenizer\nSplits text into tokens',
      extra: {},
      email: null,
      emailOnRetry: false,
      emailOnFailure: false,
      doc: null,
      docMd: null,
      docJson: null,
      docYaml: null,
      onExecuteCallback: null,
      onFailureCallback: null,
      onSuccessCallback: null,
      onRetryCallback: null,
    });
  });

  it('should skip empty documentation parts', () => {
    expect(exportOperator(new Tokenizer()).docRst).toBe('Splits text into tokens');
    expect(exportOperator(new Operator({ name: 'plain', description: 'Own text' })).docRst).toBe(
      'Own text'
    );
    expect('docRst' in exportOperator(new Operator({ name: 'bare' }))).toBe(false);
  });

  it('should use the timeout for execution timeout and SLA', () => {
    const task = exportOperator(new Tokenizer(), { timeout: 30000 });

    expect(task.executionTimeout).toBe(30000);
    expect(task.sla).toBe(30000);
  });

  it('should merge comms metadata under caller overrides', () => {
    const task = exportOperator(new Scheduled(), {
      overrides: { pool: 'gpu', sla: 5000, taskId: 'scheduled_v2' },
      logger,
    });

    expect(task.taskId).toBe('scheduled_v2');
    expect(task.sla).toBe(5000);
    expect(task.executionTimeout).toBeNull();
    expect(task.extra).toEqual({ queue: 'cpu', pool: 'gpu' });
    expect(logger.messages(LogLevel.WARN)).toEqual([]);
  });

  it('should keep metadata keys named after object members', () => {
    class Members extends Operator {
      comms(): Readonly<Record<string, unknown>> {
        return { constructor: 'ctor', toString: 'text', queue: 'q' };
      }
    }

    const task = exportOperator(new Members(), { logger });

    expect(task.extra).toEqual({ constructor: 'ctor', toString: 'text', queue: 'q' });
    expect(logger.messages(LogLevel.WARN)).toEqual([]);
  });

  it('should drop overrides of disabled fields with a warning', () => {
    const task = exportOperator(new Tokenizer(), {
      overrides: { email: 'ops@example.com' },
      logger,
    });

    expect(task.email).toBeNull();
    expect(task.extra).toEqual({});
    expect(logger.messages(LogLevel.WARN)).toEqual([
      "[DAGBridge] Ignoring 'email' for 'Tokenizer': notification and documentation fields are always disabled",
    ]);
  });

  it('should ignore badly typed task fields', () => {
    const task = exportOperator(new Tokenizer(), {
      timeout: 1000,
      overrides: { sla: 'soon', callable: 'other' },
      logger,
    });

    expect(task.sla).toBe(1000);
    expect(task.callable).toBeUndefined();
    expect(logger.messages(LogLevel.WARN)).toEqual([
      "[DAGBridge] Ignoring 'sla' for 'Tokenizer': expected a number of milliseconds or null",
      "[DAGBridge] Ignoring 'callable' for 'Tokenizer': field is set by the export",
    ]);
  });

  it('should degrade a failing comms lookup to no metadata', () => {
    const task = exportOperator(new Flaky(), { logger });

    expect(task.extra).toEqual({});
    expect(logger.messages(LogLevel.WARN)).toEqual([
      "[DAGBridge] comms() failed for 'Flaky': backend down",
    ]);
  });

  it('should degrade a failing documentation lookup', () => {
    Object.defineProperty(Undocumented, 'description', {
      get: () => {
        throw new Error('no docs');
      },
    });

    const task = exportOperator(new Undocumented(), { logger });

    expect('docRst' in task).toBe(false);
    expect(logger.messages(LogLevel.WARN)).toEqual([
      "[DAGBridge] Documentation lookup failed for 'Undocumented': no docs",
    ]);
  });
});

describe('metadata lookups', () => {
  it('should return typed results', () => {
    expect(lookupDocumentation(new Tokenizer())).toEqual({
      ok: true,
      value: 'Splits text into tokens',
    });
    expect(lookupDocumentation(new Operator())).toEqual({ ok: true, value: undefined });
    expect(lookupComms(new Scheduled())).toEqual({
      ok: true,
      value: { queue: 'cpu', pool: 'default' },
    });
    expect(lookupComms(new Operator())).toEqual({ ok: true, value: {} });
  });

  it('should report failures instead of throwing', () => {
    const result = lookupComms(new Flaky());

    expect(result.ok).toBe(false);
    if (!result.ok) {
      expect(result.error.message).toBe('backend down');
    }
  });
});

describe('exportTree / exportDag', () => {
  let root: Operator;
  let tokenize: Operator;
  let embed: Operator;

  beforeEach(() => {
    root = new Operator({ name: 'Pipeline' });
    tokenize = new Tokenizer();
    embed = new Operator({ name: 'Embedder' });
    root.setChild('tokenize', tokenize).setChild('embed', embed);
    embed.setChild('norm', new Operator({ name: 'Norm' }));
  });

  it('should name tasks after operator paths and list parents upstream', () => {
    const tasks = exportTree(root);

    expect(tasks.map(task => [task.taskId, task.upstreamTaskIds])).toEqual([
      ['Pipeline', []],
      ['Pipeline.tokenize', ['Pipeline']],
      ['Pipeline.embed', ['Pipeline']],
      ['Pipeline.embed.norm', ['Pipeline.embed']],
    ]);
  });

  it('should list every parent of a shared child', () => {
    embed.linkChild('tok', tokenize);

    const tasks = exportTree(root);

    expect(tasks.length).toBe(4);
    expect(tasks[1].upstreamTaskIds).toEqual(['Pipeline', 'Pipeline.embed']);
  });

  it('should keep path task ids when an override names a task id', () => {
    const logger = new TestLoggerAdapter();

    const tasks = exportTree(root, { overrides: { taskId: 'renamed' }, logger });

    expect(tasks[0].taskId).toBe('Pipeline');
    expect(logger.messages(LogLevel.WARN)[0]).toBe(
      "[DAGBridge] Ignoring 'taskId' for 'Pipeline': task ids of a tree are derived from operator paths"
    );
  });

  it('should wrap the tasks in a DAG named after the root task', () => {
    const dagConfig = { schedule: '@daily', owner: 'data-team' };

    const dag = exportDag(root, { dagConfig, timeout: 60000 });

    expect(dag.dagId).toBe('DAG_Pipeline');
    expect(dag.config).toBe(dagConfig);
    expect(dag.tasks.map(task => task.taskId)).toEqual([
      'Pipeline',
      'Pipeline.tokenize',
      'Pipeline.embed',
      'Pipeline.embed.norm',
    ]);
    expect(dag.tasks.every(task => task.executionTimeout === 60000)).toBe(true);
  });

  it('should refuse graphs with a cycle', () => {
    const cyclic = new Operator({ name: 'cyclic' });
    jest.spyOn(cyclic, 'isAcyclic').mockReturnValue(false);

    expect(() => exportOperator(cyclic)).toThrow(AcyclicityViolation);
  });
});
