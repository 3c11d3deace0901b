import { Command } from 'commander';
import { ensureConfig, loadConfig } from '../config.js';
import { showError } from '../ui/components.js';
import { colors } from '../ui/theme.js';

export const initCommand = new Command('init')
    .description('Set up the model provider, knowledge base and defaults')
    .action(async () => {
        try {
            const preflight = loadConfig();
            process.env.UI_MODE = preflight.uiMode;

            console.log();
            console.log(colors.primary('Setup'));
            console.log(colors.muted('This will save your settings to .env in this folder.'));
            console.log();

            await ensureConfig({ model: true }, { force: true });
            console.log(colors.success('Saved configuration to .env'));
        } catch (error) {
            showError(error instanceof Error ? error.message : String(error));
            process.exit(1);
        }
    });
