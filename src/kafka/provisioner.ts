/**
 * Topic Provisioner
 *
 * Makes sure every topic a run needs exists before any traffic starts.
 * describe-configs is the only reliable "does not exist" signal from the admin
 * API; the topic listing decides what actually gets created.
 */

import type { Logger } from 'pino';

import { ProvisioningError } from '../lib/errors.js';

// ============================================================================
// Admin Port
// ============================================================================

export interface TopicError {
  /** The broker reported the topic (or partition) as unknown */
  unknownTopic: boolean;
  message: string;
}

/** null means the call succeeded for that topic */
export type TopicResults = Map<string, TopicError | null>;

export interface NewTopicSpec {
  name: string;
  partitions: number;
  replicationFactor: number;
}

export interface BrokerAdmin {
  describeConfigs(names: string[]): Promise<TopicResults>;
  listTopics(timeoutMs: number): Promise<string[]>;
  createTopics(specs: NewTopicSpec[]): Promise<TopicResults>;
}

// ============================================================================
// Provisioner
// ============================================================================

/** Name that is never created, so describe-configs always has a known miss */
export const SENTINEL_TOPIC = 'not_a_topic_name';

export interface ProvisionOptions {
  partitions: number;
  replicationFactor?: number;
  listTopicsTimeoutMs?: number;
}

export interface ProvisionResult {
  /** Names describe-configs reported as unknown (sentinel excluded) */
  missing: string[];
  /** Names actually created */
  created: string[];
}

export class TopicProvisioner {
  private readonly admin: BrokerAdmin;
  private readonly logger: Logger;

  constructor(admin: BrokerAdmin, logger: Logger) {
    this.admin = admin;
    this.logger = logger.child({ component: 'provisioner' });
  }

  /**
   * Create whichever of the given topics do not exist yet.
   * Throws ProvisioningError if any creation fails.
   */
  async ensureTopics(names: string[], options: ProvisionOptions): Promise<ProvisionResult> {
    const needed = [...new Set(names)];
    const missing = await this.findMissing(needed);

    const existing = new Set(await this.admin.listTopics(options.listTopicsTimeoutMs ?? 10000));
    const toCreate = needed.filter((name) => !existing.has(name)).sort();

    if (toCreate.length === 0) {
      this.logger.debug({ topics: needed }, 'All topics exist');
      return { missing, created: [] };
    }

    this.logger.info({ topics: toCreate, partitions: options.partitions }, 'Creating topics');
    const results = await this.admin.createTopics(
      toCreate.map((name) => ({
        name,
        partitions: options.partitions,
        replicationFactor: options.replicationFactor ?? 1,
      }))
    );

    const failures: Record<string, string> = {};
    for (const name of toCreate) {
      const error = results.get(name);
      if (error) {
        failures[name] = error.message;
      }
    }

    const failed = Object.keys(failures);
    if (failed.length > 0) {
      this.logger.error({ failures }, 'Topic creation failed');
      throw new ProvisioningError(`Failed to create topics: ${failed.join(', ')}`, { failures });
    }

    return { missing, created: toCreate };
  }

  /**
   * describe-configs for the needed names plus the sentinel. Unknown-topic
   * errors mark a topic missing; anything else is only logged.
   */
  private async findMissing(needed: string[]): Promise<string[]> {
    const results = await this.admin.describeConfigs([...needed, SENTINEL_TOPIC]);
    const missing: string[] = [];

    for (const [name, error] of results) {
      if (!error) continue;

      if (error.unknownTopic) {
        if (name !== SENTINEL_TOPIC) {
          missing.push(name);
          this.logger.debug({ topic: name }, 'Topic does not exist');
        }
      } else {
        this.logger.warn({ topic: name, reason: error.message }, 'Unexpected describe-configs error');
      }
    }

    return missing.sort();
  }
}
