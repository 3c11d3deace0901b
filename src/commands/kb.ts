/**
 * KB Command - Check that the knowledge base answers queries
 */

import { Command } from 'commander';
import { KnowledgeBaseClient } from '../clients/knowledge-base.js';
import { createSpinner, showError } from '../ui/components.js';
import { colors, icons } from '../ui/theme.js';
import { prepareConfig } from './shared.js';

export const kbCommand = new Command('kb')
    .description('Knowledge base utilities');

kbCommand
    .command('test')
    .description('Run a probe query against the knowledge base')
    .option('--kb <id>', 'Knowledge base id (overrides KB_ID)')
    .option('-q, --query <text>', 'Probe query', 'test')
    .option('--ui <mode>', 'UI mode: minimal | fancy | plain')
    .action(async (options: { kb?: string; query: string; ui?: string }) => {
        try {
            const config = await prepareConfig(options, { model: false, kb: true });
            const client = new KnowledgeBaseClient({
                region: config.awsRegion,
                network: config.network,
                searchType: config.kbSearchType,
            });

            const spinner = createSpinner(`Querying ${config.kbId}...`);
            spinner.start();
            const status = await client.testConnection(config.kbId, options.query);
            spinner.stop();

            if (!status.ok) {
                throw new Error(status.error ?? `Knowledge base ${config.kbId} did not respond`);
            }

            const plural = status.resultCount === 1 ? '' : 's';
            console.log(
                `${colors.success(icons.complete)} ${config.kbId} ${colors.muted(`(${config.awsRegion}, ${config.kbSearchType})`)} ` +
                colors.muted(`returned ${status.resultCount} result${plural}`)
            );
        } catch (error) {
            showError(error instanceof Error ? error.message : String(error));
            process.exit(1);
        }
    });
