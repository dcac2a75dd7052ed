#!/usr/bin/env node

import { Command, Option } from 'commander';

import { VALIDATION_STRATEGIES } from '../pipeline/strategies.js';
import { createKafkaEnvironment, runProduce, type BenchEnvironment } from '../runtime.js';
import { formatProducerReport, parseInteger, runProgram } from './common.js';

interface ProduceCliOptions {
  number: number;
  index: number;
  nowaitAck: boolean;
  validation: string;
  partitions: number;
}

export function createProgram(
  makeEnvironment: (noWaitAck: boolean) => BenchEnvironment = (noWaitAck) =>
    createKafkaEnvironment({ noWaitAck })
): Command {
  const program = new Command();

  program
    .name('busbench-produce')
    .description('Write messages for one topic of one component')
    .argument('<component>', 'component name')
    .argument('<topic>', 'topic name, e.g. evt_scalars')
    .option('-n, --number <count>', 'number of messages to write', parseInteger, 1)
    .option('--index <index>', 'component index; ignored for non-indexed components', parseInteger, 0)
    .option('--nowait-ack', 'do not wait for the broker to acknowledge each message', false)
    .addOption(
      new Option('--validation <strategy>', 'validation applied to each message')
        .choices(VALIDATION_STRATEGIES)
        .default('dataclass')
    )
    .option('--partitions <count>', 'partitions for topics this run creates', parseInteger, 1)
    .action(async (component: string, topic: string) => {
      const options = program.opts<ProduceCliOptions>();
      const env = makeEnvironment(options.nowaitAck);
      const report = await runProduce(
        {
          component,
          topic,
          count: options.number,
          index: options.index,
          validation: options.validation,
          partitions: options.partitions,
        },
        env
      );
      console.log(formatProducerReport(report));
    });

  return program;
}

if (require.main === module) {
  void runProgram(createProgram(), process.argv);
}
