import { Command } from 'commander';
import { DEFAULTS } from '../config.js';
import { readFounderMap, verifyResults } from '../founders/verify.js';
import { showError, showVerification } from '../ui/components.js';
import { errorMessage } from '../errors.js';

export const verifyCommand = new Command('verify')
    .description('Check a results file against known founders')
    .argument('[results]', 'Results JSON written by "run"', DEFAULTS.outputFile)
    .requiredOption('-e, --expected <file>', 'JSON object mapping company names to expected founders')
    .action(async (results: string, options: { expected: string }) => {
        try {
            const [actual, expected] = await Promise.all([
                readFounderMap(results),
                readFounderMap(options.expected),
            ]);
            const report = verifyResults(actual, expected);
            showVerification(report);
            if (!report.passed) process.exit(1);
        } catch (error) {
            showError(errorMessage(error));
            process.exit(1);
        }
    });
