import { Command } from 'commander';
import { getDefaultEnvPath, loadConfig, loadEnvironment, promptForKeys } from '../config.js';
import { ConfigError, errorMessage } from '../errors.js';
import { showError } from '../ui/components.js';
import { colors } from '../ui/theme.js';

export const initCommand = new Command('init')
    .description('Save OpenRouter and Exa API keys to .env')
    .option('-f, --force', 'Re-enter API keys even if set')
    .action(async (options: { force?: boolean }) => {
        try {
            if (!process.stdin.isTTY || !process.stdout.isTTY) {
                throw new ConfigError('init needs an interactive terminal. Set OPENROUTER_API_KEY and EXA_API_KEY in .env instead.');
            }

            const envPath = getDefaultEnvPath();
            const current = loadConfig(await loadEnvironment(envPath));

            console.log();
            console.log(colors.primary('Setup'));
            console.log(colors.muted(`Keys are saved to ${envPath}`));
            console.log();

            await promptForKeys(current, { envPath, force: Boolean(options.force) });
            console.log(colors.success(`Saved configuration to ${envPath}`));
        } catch (error) {
            showError(errorMessage(error));
            process.exit(1);
        }
    });
