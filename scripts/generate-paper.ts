#!/usr/bin/env npx tsx
/**
 * Generate a question paper from a syllabus and reference text
 *
 * Usage:
 *   npx tsx scripts/generate-paper.ts --syllabus <file> --reference <file> [options]
 *
 * Environment (via .env):
 *   LLM_PROVIDER        groq (default) or openai
 *   GROQ_API_KEY        Required for groq
 *   OPENAI_API_KEY      Required for openai
 *   LLM_MODEL           Optional model override
 *   LLM_BASE_URL        Optional endpoint for OpenAI-compatible providers
 *   HISTORY_DIR         Directory for question history files (default: .)
 */

import {FileStorageAdapter} from '../src/adapters/filesystem/FileStorageAdapter';
import {describeError} from '../src/domain/generation/errors';
import {
	PaperOrchestrator,
	formatDistribution,
	formatPaperLayout,
	renderPaperText,
	summarizeDistribution,
} from '../src/domain/paper';
import {getUnitShortName} from '../src/domain/syllabus';
import {
	createLLMProvider,
	loadSettingsFromEnv,
	parseDifficulty,
	toPaperOptions,
	validateSettings,
	type PaperGeneratorSettings,
} from '../src/settings';
import {getArg, readTextFile, requireArg, writeTextFile} from './lib/cli-helpers';

/**
 * Path of the formatted layout written beside the paper
 */
function layoutPathFor(outputPath: string): string {
	return `${outputPath.replace(/\.txt$/i, '')}_layout.txt`;
}

async function main() {
	const args = process.argv.slice(2);

	if (args.includes('--help') || args.includes('-h')) {
		console.log(`
Question Paper Generator

Builds a 100-mark paper: ten 1-mark MCQs, eight 6-mark questions (Q11-Q18)
and ten 12-mark questions (Q19-Q28), skipping questions recorded in the
history files of earlier runs.

Usage:
  npx tsx scripts/generate-paper.ts --syllabus <file> --reference <file> [options]

Environment (via .env):
  LLM_PROVIDER        groq (default) or openai
  GROQ_API_KEY        Required for groq
  OPENAI_API_KEY      Required for openai
  LLM_MODEL           Optional model override
  LLM_BASE_URL        Optional endpoint for OpenAI-compatible providers
  HISTORY_DIR         Directory for question history files (default: .)

Options:
  --syllabus <file>        Syllabus text file (required)
  --reference <file>       Reference material text file (required)
  --difficulty <level>     Easy, Medium or Hard (default: Medium)
  --mcqs-per-unit <n>      One-mark questions per unit, 1-10 (default: 2)
  --output <file>          Output file (default: outputs/question_paper.txt)
  --layout                 Also write the formatted layout (<output>_layout.txt)
  --subject-code <code>    Subject code for the layout header
  --subject-name <name>    Subject name for the layout header
  --session <session>      Exam session for the layout header, e.g. NOV/DEC-2025
  --history-dir <dir>      Directory for question history files
  --reset-history          Clear question history before generating
  --help, -h               Show help

Examples:
  # Generate a medium paper
  npx tsx scripts/generate-paper.ts --syllabus syllabus.txt --reference notes.txt

  # Hard paper with three MCQs per unit and a formatted layout
  npx tsx scripts/generate-paper.ts --syllabus syllabus.txt --reference notes.txt \\
    --difficulty Hard --mcqs-per-unit 3 --layout --subject-code CS3501
`);
		process.exit(0);
	}

	const syllabusPath = requireArg(args, '--syllabus');
	const referencePath = requireArg(args, '--reference');
	const outputPath = getArg(args, '--output') ?? 'outputs/question_paper.txt';
	const writeLayout = args.includes('--layout');
	const resetHistory = args.includes('--reset-history');

	const overrides: Partial<PaperGeneratorSettings> = {};
	const difficulty = getArg(args, '--difficulty');
	if (difficulty) overrides.difficulty = parseDifficulty(difficulty);
	const mcqsPerUnit = getArg(args, '--mcqs-per-unit');
	if (mcqsPerUnit) overrides.questionsPerUnit = Number(mcqsPerUnit);
	const historyDir = getArg(args, '--history-dir');
	if (historyDir) overrides.historyDir = historyDir;

	const settings = loadSettingsFromEnv(process.env, overrides);
	validateSettings(settings);

	const syllabusText = readTextFile(syllabusPath, 'Syllabus');
	const referenceText = readTextFile(referencePath, 'Reference');

	const llmProvider = createLLMProvider(settings);
	const storageAdapter = new FileStorageAdapter(settings.historyDir);

	console.error('=== Question Paper Generation ===');
	console.error(`Provider: ${llmProvider.getProviderName()} (${llmProvider.getModelName()})`);
	console.error(`Difficulty: ${settings.difficulty}`);
	console.error(`MCQs per unit: ${settings.questionsPerUnit}`);
	console.error(`History: ${settings.historyDir}`);
	console.error('');

	const orchestrator = new PaperOrchestrator(llmProvider, storageAdapter, {
		...toPaperOptions(settings),
		retryHooks: {
			onRetry: ({attempt, maxRetries, delayMs, error}) => {
				console.error(`  Rate limited, retry ${attempt}/${maxRetries} in ${(delayMs / 1000).toFixed(1)}s: ${describeError(error)}`);
			},
		},
	});

	if (resetHistory) {
		console.error('Clearing question history...');
		await orchestrator.clearHistory();
	}

	const startTime = Date.now();
	const paper = await orchestrator.generate({syllabusText, referenceText}, (progress) => {
		console.error(`[${progress.stage}] ${progress.message}`);
	});
	const durationMs = Date.now() - startTime;

	console.error('');
	console.error(`=== Units${paper.usedFallbackUnits ? ' (default)' : ''} ===`);
	for (const unit of paper.units) {
		console.error(`  ${getUnitShortName(unit)}: ${unit}`);
	}

	if (paper.warnings.length > 0) {
		console.error('');
		console.error('=== Warnings ===');
		for (const warning of paper.warnings) {
			console.error(`  ${warning}`);
		}
	}

	const summary = summarizeDistribution(paper);
	console.error('');
	console.error('=== Distribution ===');
	console.error(formatDistribution(summary));
	console.error('');
	console.error(`Total marks: ${summary.totals.marks}`);

	const paperText = renderPaperText(paper);
	writeTextFile(outputPath, paperText);

	console.error('');
	console.error('=== Complete ===');
	console.error(`Duration: ${(durationMs / 1000).toFixed(2)}s`);
	console.error(`Output saved to: ${outputPath}`);

	if (writeLayout) {
		const layoutPath = layoutPathFor(outputPath);
		writeTextFile(
			layoutPath,
			formatPaperLayout(paperText, {
				subjectCode: getArg(args, '--subject-code'),
				subjectName: getArg(args, '--subject-name'),
				session: getArg(args, '--session'),
			}),
		);
		console.error(`Layout saved to: ${layoutPath}`);
	}
}

main().catch((err) => {
	console.error('Error:', err.message);
	console.error(err.stack);
	process.exit(1);
});
