/**
 * Shared CLI helpers
 */

import { InvalidArgumentError, type Command } from 'commander';

import { createLogger, type Logger } from '../lib/logger.js';
import type { ConsumedMessage } from '../pipeline/consumer.js';
import type { ConsumerReport, ProducerReport } from '../types.js';

export function parseInteger(value: string): number {
  const parsed = Number(value);
  if (value.trim() === '' || !Number.isInteger(parsed)) {
    throw new InvalidArgumentError(`"${value}" is not an integer.`);
  }
  return parsed;
}

export function formatProducerReport(report: ProducerReport): string {
  return `Wrote ${report.messagesPerSecond.toFixed(1)} messages/second (${report.count} to ${report.topic})`;
}

export function formatConsumerReport(report: ConsumerReport): string[] {
  const { delay } = report;
  return [
    `Read ${report.messagesPerSecond.toFixed(1)} messages/second (${report.count} from ${report.topics.join(', ')})`,
    `Delay mean = ${delay.mean.toFixed(3)}, stdev = ${delay.stdev.toFixed(3)}, ` +
      `min = ${delay.min.toFixed(3)}, max = ${delay.max.toFixed(3)} seconds`,
  ];
}

export function formatMessage(message: ConsumedMessage): string {
  return `read [${message.index}] ${message.topic.logicalName}: ${JSON.stringify(message.processed)}`;
}

/**
 * Parse argv and run the command; any failure is logged and turns into
 * exit code 1
 */
export async function runProgram(program: Command, argv: string[], logger: Logger = createLogger(program.name())): Promise<void> {
  try {
    await program.parseAsync(argv);
  } catch (err) {
    logger.error({ err }, 'Run failed');
    process.exitCode = 1;
  }
}
