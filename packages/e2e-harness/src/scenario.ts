import { appendFile, mkdir, readFile } from 'node:fs/promises';
import path from 'node:path';
import { z } from 'zod';
import {
  jsonEquals,
  jsonValueSchema,
  parseJsonOrString,
  type JsonObject,
  type Logger
} from '@flowbench/shared';
import type { BusConnection, BusConnector, BusSubscription } from './bus';
import { AssertionMismatchError, AwaitTimeoutError, PayloadMismatchError } from './errors';

export const DEFAULT_AWAIT_TIMEOUT_MS = 5_000;
export const OBSERVATIONS_FILE = 'observations.jsonl';

const subjectSchema = z.string().trim().min(1);

const scenarioStepSchema = z.discriminatedUnion('type', [
  z.object({ type: z.literal('publish'), subject: subjectSchema, payload: jsonValueSchema }),
  z.object({
    type: z.literal('await'),
    subject: subjectSchema,
    expected: jsonValueSchema.optional(),
    timeoutMs: z.number().int().positive().optional()
  }),
  z.object({ type: z.literal('assert-equal'), actual: jsonValueSchema, expected: jsonValueSchema }),
  z.object({ type: z.literal('install-pack'), packId: z.string().min(1) }),
  z.object({ type: z.literal('start-service'), name: z.string().min(1) }),
  z.object({ type: z.literal('http-post'), url: z.string().min(1), body: jsonValueSchema })
]);

const scenarioSchema = z.object({
  name: z.string().min(1),
  steps: z.array(scenarioStepSchema)
});

export type ScenarioStep = z.infer<typeof scenarioStepSchema>;
export type Scenario = z.infer<typeof scenarioSchema>;

export function parseScenario(input: unknown): Scenario {
  return scenarioSchema.parse(input);
}

export type Observation = {
  step: string;
  data: JsonObject;
};

const observationSchema = z.object({
  step: z.string(),
  data: z.record(jsonValueSchema)
});

export type ScenarioRunnerOptions = {
  connect: BusConnector;
  artifactsDir: string;
  logger?: Logger;
};

/**
 * Executes scenario steps in order against one lazily opened bus connection.
 * Subscriptions are cached per subject and survive across `run` calls until
 * `close()`.
 */
export class ScenarioRunner {
  readonly observationsPath: string;
  private readonly connect: BusConnector;
  private readonly logger?: Logger;
  private connection: BusConnection | null = null;
  private readonly subscriptions = new Map<string, BusSubscription>();

  constructor(options: ScenarioRunnerOptions) {
    this.connect = options.connect;
    this.logger = options.logger;
    this.observationsPath = path.join(options.artifactsDir, OBSERVATIONS_FILE);
  }

  async run(scenario: Scenario): Promise<void> {
    this.logger?.info({ scenario: scenario.name, steps: scenario.steps.length }, 'running scenario');
    for (const [index, step] of scenario.steps.entries()) {
      try {
        await this.execute(step);
      } catch (err) {
        this.logger?.error({ err, scenario: scenario.name, step: index, type: step.type }, 'scenario step failed');
        throw err;
      }
    }
  }

  async close(): Promise<void> {
    const subscriptions = Array.from(this.subscriptions.values());
    this.subscriptions.clear();
    for (const subscription of subscriptions) {
      await subscription.unsubscribe();
    }
    const connection = this.connection;
    this.connection = null;
    await connection?.close();
  }

  private async execute(step: ScenarioStep): Promise<void> {
    switch (step.type) {
      case 'publish': {
        const connection = await this.ensureConnection();
        await this.ensureSubscription(step.subject);
        await connection.publish(step.subject, JSON.stringify(step.payload));
        await this.record('bus_publish', { subject: step.subject, payload: step.payload });
        return;
      }
      case 'await': {
        const subscription = await this.ensureSubscription(step.subject);
        const timeoutMs = step.timeoutMs ?? DEFAULT_AWAIT_TIMEOUT_MS;
        const raw = await subscription.next(timeoutMs);
        if (raw === null) {
          throw new AwaitTimeoutError(step.subject, timeoutMs);
        }
        const payload = parseJsonOrString(raw);
        if (step.expected !== undefined && !jsonEquals(payload, step.expected)) {
          throw new PayloadMismatchError(step.subject, step.expected, payload);
        }
        await this.record('await_bus', { subject: step.subject, payload });
        return;
      }
      case 'assert-equal':
        if (!jsonEquals(step.actual, step.expected)) {
          throw new AssertionMismatchError(step.actual, step.expected);
        }
        await this.record('assert_json', { actual: step.actual, expected: step.expected });
        return;
      case 'install-pack':
        await this.record('install_pack_stub', { packId: step.packId });
        return;
      case 'start-service':
        await this.record('start_service_stub', { name: step.name });
        return;
      case 'http-post':
        await this.record('http_post_stub', { url: step.url, body: step.body });
        return;
    }
  }

  private async ensureConnection(): Promise<BusConnection> {
    if (!this.connection) {
      this.connection = await this.connect();
    }
    return this.connection;
  }

  private async ensureSubscription(subject: string): Promise<BusSubscription> {
    const existing = this.subscriptions.get(subject);
    if (existing) {
      return existing;
    }
    const connection = await this.ensureConnection();
    const subscription = await connection.subscribe(subject);
    this.subscriptions.set(subject, subscription);
    return subscription;
  }

  private async record(step: string, data: JsonObject): Promise<void> {
    const observation: Observation = { step, data };
    await mkdir(path.dirname(this.observationsPath), { recursive: true });
    await appendFile(this.observationsPath, `${JSON.stringify(observation)}\n`, 'utf8');
  }
}

export async function readObservations(filePath: string): Promise<Observation[]> {
  const raw = await readFile(filePath, 'utf8');
  return raw
    .split('\n')
    .filter((line) => line.trim().length > 0)
    .map((line) => observationSchema.parse(JSON.parse(line)));
}
