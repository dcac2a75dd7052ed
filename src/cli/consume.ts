#!/usr/bin/env node

import { Command, Option } from 'commander';

import { POSTPROCESS_STRATEGIES } from '../pipeline/strategies.js';
import { createKafkaEnvironment, runConsume, type BenchEnvironment } from '../runtime.js';
import { formatConsumerReport, formatMessage, parseInteger, runProgram } from './common.js';

interface ConsumeCliOptions {
  number: number;
  time: boolean;
  maxHistoryRead: number;
  partitions: number;
  postprocess: string;
}

export function createProgram(makeEnvironment: () => BenchEnvironment = () => createKafkaEnvironment()): Command {
  const program = new Command();

  program
    .name('busbench-consume')
    .description('Read messages for one or more topics of one component')
    .argument('<component>', 'component name')
    .argument('<topics...>', 'topic names, e.g. evt_scalars tel_arrays')
    .option('-n, --number <count>', 'number of messages to read; 0 reads forever', parseInteger, 10)
    .option('-t, --time', 'measure throughput and delay instead of printing messages', false)
    .option(
      '--max-history-read <count>',
      'messages per partition to replay from before the subscription; 0 starts at the latest',
      parseInteger,
      1000
    )
    .option('--partitions <count>', 'partitions for topics this run creates', parseInteger, 1)
    .addOption(
      new Option('--postprocess <strategy>', 'processing applied to each decoded message')
        .choices(POSTPROCESS_STRATEGIES)
        .default('dataclass')
    )
    .action(async (component: string, topics: string[]) => {
      const options = program.opts<ConsumeCliOptions>();
      const report = await runConsume(
        {
          component,
          topics,
          count: options.number,
          time: options.time,
          maxHistoryRead: options.maxHistoryRead,
          partitions: options.partitions,
          postProcess: options.postprocess,
          onMessage: (message) => console.log(formatMessage(message)),
        },
        makeEnvironment()
      );
      if (options.time) {
        for (const line of formatConsumerReport(report)) console.log(line);
      }
    });

  return program;
}

if (require.main === module) {
  void runProgram(createProgram(), process.argv);
}
