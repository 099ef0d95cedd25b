import { describeError } from '@/domain/generation/errors';
import { RetryingLLMProvider } from '@/domain/generation/RetryingLLMProvider';
import { QuestionHistoryStore } from '@/domain/history/QuestionHistoryStore';
import { type UnitDescriptor, getUnitShortName, resolveUnits } from '@/domain/syllabus';
import {
  ONE_MARK_TIER,
  SIX_MARK_START,
  SIX_MARK_TIER,
  SIX_MARK_TOTAL,
  TWELVE_MARK_START,
  TWELVE_MARK_TIER,
  TWELVE_MARK_TOTAL,
  type TierContext,
  type TierDefinition,
  type TierResult,
  buildTierResult,
  generateOneMarkTier,
  generateSixMarkTier,
  generateTwelveMarkTier,
  placeholderRecords,
} from '@/domain/tiers';
import type { ILLMProvider } from '@/ports/ILLMProvider';
import type { IStorageAdapter } from '@/ports/IStorageAdapter';
import {
  DEFAULT_PAPER_OPTIONS,
  type GeneratedPaper,
  type PaperInput,
  type PaperOptions,
  type PaperProgress,
} from './types';

/**
 * Placeholder bodies used when a whole descriptive tier fails
 */
const TIER_FALLBACK_BODIES = {
  six_mark: ' Explain the key concepts from the syllabus with examples.',
  twelve_mark:
    ' Discuss in detail the important concepts and applications from the syllabus with comprehensive analysis and examples.',
} as const;

/**
 * Assembles a full paper from a syllabus and reference text
 *
 * Stages:
 * 1. Units - Segment the syllabus (falling back to default units)
 * 2. One-mark - MCQs per unit, numbered from 1
 * 3. Six-mark - Eight questions, numbered from 11
 * 4. Twelve-mark - Ten questions, numbered from 19
 *
 * Generation faults never escape: failed units and failed tiers are filled
 * with placeholders and reported as warnings.
 */
export class PaperOrchestrator {
  private options: PaperOptions;

  constructor(
    private llmProvider: ILLMProvider,
    private storageAdapter: IStorageAdapter,
    options: Partial<PaperOptions> = {},
  ) {
    this.options = { ...DEFAULT_PAPER_OPTIONS, ...options };
  }

  /**
   * Generate a paper
   *
   * @param onProgress - Optional callback for progress updates
   */
  async generate(
    input: PaperInput,
    onProgress?: (progress: PaperProgress) => void,
  ): Promise<GeneratedPaper> {
    this.reportProgress(onProgress, 'units', 0, 1, 'Detecting units...');
    const resolution = resolveUnits(input.syllabusText);
    const { units } = resolution;
    const warnings = resolution.warning ? [resolution.warning] : [];
    this.reportProgress(onProgress, 'units', 1, 1, `Found ${units.length} units`);

    this.reportProgress(onProgress, 'one_mark', 0, 1, 'Generating one-mark questions...');
    const oneMark = await this.runTier(ONE_MARK_TIER, input, units, (context) =>
      generateOneMarkTier(units, context, {
        questionsPerUnit: this.options.questionsPerUnit,
        numbering: this.options.oneMarkNumbering,
      }),
    );
    this.reportProgress(onProgress, 'one_mark', 1, 1, `${oneMark.records.length} one-mark questions`);

    this.reportProgress(onProgress, 'six_mark', 0, 1, 'Generating six-mark questions...');
    const sixMark = await this.runTier(SIX_MARK_TIER, input, units, (context) =>
      generateSixMarkTier(units, context),
    );
    this.reportProgress(onProgress, 'six_mark', 1, 1, `${sixMark.records.length} six-mark questions`);

    this.reportProgress(onProgress, 'twelve_mark', 0, 1, 'Generating twelve-mark questions...');
    const twelveMark = await this.runTier(TWELVE_MARK_TIER, input, units, (context) =>
      generateTwelveMarkTier(units, context),
    );
    this.reportProgress(
      onProgress,
      'twelve_mark',
      1,
      1,
      `${twelveMark.records.length} twelve-mark questions`,
    );

    return {
      units,
      usedFallbackUnits: resolution.usedFallback,
      oneMark,
      sixMark,
      twelveMark,
      warnings: [...warnings, ...oneMark.warnings, ...sixMark.warnings, ...twelveMark.warnings],
    };
  }

  /**
   * Forget every recorded question of all three tiers
   */
  async clearHistory(): Promise<void> {
    for (const tier of [ONE_MARK_TIER, SIX_MARK_TIER, TWELVE_MARK_TIER]) {
      await new QuestionHistoryStore(this.storageAdapter, tier.historyKey).clear();
    }
  }

  /**
   * Run one tier with its own history store and retry policy. A failure of
   * the tier as a whole (such as unreadable history) yields the tier's
   * fallback block.
   */
  private async runTier(
    tier: TierDefinition,
    input: PaperInput,
    units: UnitDescriptor[],
    run: (context: TierContext) => Promise<TierResult>,
  ): Promise<TierResult> {
    const history = new QuestionHistoryStore(this.storageAdapter, tier.historyKey);

    try {
      await history.load();
      return await run({
        provider: new RetryingLLMProvider(
          this.llmProvider,
          this.options.retry,
          this.options.retryHooks,
        ),
        history,
        referenceText: input.referenceText,
        difficulty: this.options.difficulty,
        unitDelayMs: this.options.unitDelayMs,
        relevance: this.options.relevance,
        sleep: this.options.sleep,
        random: this.options.random,
      });
    } catch (error) {
      const warning = `Error generating ${tier.label} questions: ${describeError(error)}`;
      return this.tierFallback(tier, units, warning);
    }
  }

  private tierFallback(tier: TierDefinition, units: UnitDescriptor[], warning: string): TierResult {
    const id = tier.id;
    if (id === 'one_mark') {
      let counter = 1;
      const sections = units.map((unit) => {
        const unitName = getUnitShortName(unit);
        const records = placeholderRecords(tier, unitName, counter, this.options.questionsPerUnit);
        counter += this.options.questionsPerUnit;
        return { unitName, records };
      });
      return buildTierResult(tier, sections, [warning]);
    }

    const [start, total] =
      id === 'six_mark' ? [SIX_MARK_START, SIX_MARK_TOTAL] : [TWELVE_MARK_START, TWELVE_MARK_TOTAL];
    const fallbackTier = { ...tier, placeholderBody: TIER_FALLBACK_BODIES[id] };
    const records = placeholderRecords(fallbackTier, '', start, total);
    return buildTierResult(tier, [{ unitName: '', records }], [warning]);
  }

  /**
   * Report progress if callback is provided
   */
  private reportProgress(
    onProgress: ((progress: PaperProgress) => void) | undefined,
    stage: PaperProgress['stage'],
    current: number,
    total: number,
    message: string,
  ): void {
    if (onProgress) {
      onProgress({ stage, current, total, message });
    }
  }
}
