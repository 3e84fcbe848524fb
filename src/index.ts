#!/usr/bin/env node
import { Command } from 'commander';
import { registerAnalyzeCommand } from './commands/analyze.js';
import { registerSuggestCommand } from './commands/suggest.js';
import { registerSynthCommand } from './commands/synth.js';
import { registerHistoryCommand } from './commands/history.js';

const program = new Command();

program
  .name('niche-radar')
  .description('Rank content niches by search demand, competition and social signals')
  .version('0.1.0');

registerAnalyzeCommand(program);
registerSuggestCommand(program);
registerSynthCommand(program);
registerHistoryCommand(program);

await program.parseAsync();
