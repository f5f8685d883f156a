/**
 * Spoken Tutor
 * Composition root: settings, scheduling core, and the operations the route layer calls
 */

import {
  type TutorSettings,
  type PartialTutorSettings,
  migrateSettings,
  validateSettings,
} from './settings';
import { AdaptiveComplexityTracker } from './core/application/services/complexity-tracker';
import { SessionRegistry } from './core/application/services/session-registry';
import { VocabularyStore } from './core/application/services/vocabulary-store';
import { RecordTurnUseCase } from './core/application/use-cases/record-turn';
import { SavePhraseUseCase } from './core/application/use-cases/save-phrase';
import { CompleteReviewUseCase, type CompleteReviewOutput } from './core/application/use-cases/complete-review';
import { ListDuePhrasesUseCase } from './core/application/use-cases/list-due-phrases';
import { GroupByDifficultyUseCase } from './core/application/use-cases/group-by-difficulty';
import { TrackVocabularyUseCase } from './core/application/use-cases/track-vocabulary';
import {
  ContinueConversationSchema,
  MarkReviewedSchema,
  SaveGuidedPhraseSchema,
  SavePhraseSchema,
  StartConversationSchema,
  parseRequest,
  type ContinueConversationRequest,
  type MarkReviewedRequest,
  type SaveGuidedPhraseRequest,
  type SavePhraseRequest,
  type StartConversationRequest,
} from './core/application/validation/request-schemas';
import { FixedIntervalScheduler } from './adapters/scheduling/fixed-interval-scheduler';
import { JsonFileVocabularyPersistence } from './adapters/storage/json-file-vocabulary-persistence';
import type { IVocabularyPersistence } from './core/domain/interfaces/vocabulary-persistence.interface';
import type {
  IConversationCollaborator,
  TutorTurnContext,
} from './core/domain/interfaces/conversation-collaborator.interface';
import type { SessionPerformance } from './core/domain/entities/session-performance';
import type { VocabularyPhrase } from './core/domain/entities/vocabulary-phrase';
import type {
  ComplexityAdjustment,
  PerformanceStats,
} from './core/domain/value-objects/complexity-adjustment';
import type { VocabularyStatistics } from './core/domain/value-objects/vocabulary-statistics';
import { COMPLEXITY_INSTRUCTIONS } from './core/domain/constants/complexity-constants';
import { PersistenceError, ValidationError } from './core/domain/errors/tutor-errors';
import { parseGuidedPhrase } from './core/domain/utils/phrase-parser';
import { systemClock, type Clock } from './core/domain/utils/time';

const LOG_TAG = '[Tutor]';

export interface TutorAppDependencies {
  persistence?: IVocabularyPersistence;     // 기본: settings.storage.vocabularyFile JSON
  conversation?: IConversationCollaborator; // 없으면 reply 없이 컨텍스트만 반환
  clock?: Clock;
}

export interface StartConversationOutput {
  sessionId: string;
  complexity: SessionPerformance['complexityLevel'];
  context: TutorTurnContext;
  reply?: string;
}

export interface ContinueConversationOutput {
  complexity: SessionPerformance['complexityLevel'];
  adjustment: ComplexityAdjustment;
  performance: PerformanceStats;
  context: TutorTurnContext;
  reply?: string;
}

export interface ListDueOptions {
  now?: Date;
  limit?: number;
}

export class TutorApp {
  readonly settings: TutorSettings;

  // Services
  private readonly clock: Clock;
  private readonly conversation: IConversationCollaborator | null;
  private readonly tracker: AdaptiveComplexityTracker;
  private readonly sessions: SessionRegistry;
  private readonly store: VocabularyStore;

  // Use cases
  private readonly recordTurnUseCase: RecordTurnUseCase;
  private readonly savePhraseUseCase: SavePhraseUseCase;
  private readonly completeReviewUseCase: CompleteReviewUseCase;
  private readonly listDueUseCase: ListDuePhrasesUseCase;
  private readonly groupByDifficultyUseCase: GroupByDifficultyUseCase;
  private readonly trackVocabularyUseCase: TrackVocabularyUseCase;

  private constructor(settings: TutorSettings, deps: TutorAppDependencies) {
    this.settings = settings;
    this.clock = deps.clock ?? systemClock;
    this.conversation = deps.conversation ?? null;

    const scheduler = new FixedIntervalScheduler(settings.review.intervalsDays);
    const persistence =
      deps.persistence ?? new JsonFileVocabularyPersistence(settings.storage.vocabularyFile);

    this.tracker = new AdaptiveComplexityTracker(settings.complexity);
    this.sessions = new SessionRegistry(this.clock);
    this.store = new VocabularyStore(persistence);

    this.recordTurnUseCase = new RecordTurnUseCase(this.tracker, this.sessions);
    this.savePhraseUseCase = new SavePhraseUseCase(scheduler, this.store, this.clock);
    this.completeReviewUseCase = new CompleteReviewUseCase(scheduler, this.store, this.clock);
    this.listDueUseCase = new ListDuePhrasesUseCase(scheduler, this.store);
    this.groupByDifficultyUseCase = new GroupByDifficultyUseCase(this.store);
    this.trackVocabularyUseCase = new TrackVocabularyUseCase(scheduler, this.store);
  }

  /**
   * 설정 검증 → 서비스 구성 → 어휘 저장소 로드
   */
  static async create(
    settings: PartialTutorSettings = {},
    deps: TutorAppDependencies = {}
  ): Promise<TutorApp> {
    const merged = migrateSettings(settings);
    const errors = validateSettings(merged);
    if (errors.length > 0) {
      throw new ValidationError('Invalid settings', errors);
    }

    const app = new TutorApp(merged, deps);
    await app.store.load();
    app.debug(`Loaded ${app.store.size} saved phrases`);
    return app;
  }

  // ===========================================================================
  // Conversation
  // ===========================================================================

  async startConversation(request: StartConversationRequest): Promise<StartConversationOutput> {
    const input = parseRequest(StartConversationSchema, request, 'start conversation');
    const session = this.sessions.start(input);
    this.debug(`Session ${session.sessionId} started (${session.language}, ${session.mode})`);

    const context = this.buildTurnContext(session, COMPLEXITY_INSTRUCTIONS.maintain);
    const reply = await this.requestReply(context);

    return {
      sessionId: session.sessionId,
      complexity: session.complexityLevel,
      context,
      ...(reply !== undefined && { reply }),
    };
  }

  async continueConversation(
    request: ContinueConversationRequest
  ): Promise<ContinueConversationOutput> {
    const input = parseRequest(ContinueConversationSchema, request, 'continue conversation');
    const { session, adjustment, performance } = this.recordTurnUseCase.execute({
      sessionId: input.sessionId,
      successful: input.successful,
    });

    if (adjustment.level !== adjustment.previousLevel) {
      this.debug(
        `Session ${session.sessionId} complexity ${adjustment.previousLevel} -> ${adjustment.level}`
      );
    }

    const context = this.buildTurnContext(session, adjustment.instruction, input.userText);
    const reply = await this.requestReply(context);

    return {
      complexity: session.complexityLevel,
      adjustment,
      performance,
      context,
      ...(reply !== undefined && { reply }),
    };
  }

  /**
   * @returns 세션이 존재했는지
   */
  endConversation(sessionId: string): boolean {
    return this.sessions.end(sessionId);
  }

  getSessionStats(sessionId: string): PerformanceStats {
    return this.tracker.getPerformanceStats(this.sessions.get(sessionId));
  }

  // ===========================================================================
  // Vocabulary
  // ===========================================================================

  async savePhrase(request: SavePhraseRequest): Promise<VocabularyPhrase> {
    const input = parseRequest(SavePhraseSchema, request, 'save phrase');
    const { phrase } = await this.withPersistenceRetry('save phrase', () =>
      this.savePhraseUseCase.execute(input)
    );
    this.debug(`Saved phrase: ${phrase.englishTranslation || phrase.phraseKey}`);
    return phrase;
  }

  /**
   * 가이드 모드 튜터 발화를 파싱해 저장
   * 난이도 버킷은 세션의 현재 레벨 (세션 없으면 1)
   */
  async saveGuidedPhrase(request: SaveGuidedPhraseRequest): Promise<VocabularyPhrase> {
    const input = parseRequest(SaveGuidedPhraseSchema, request, 'save guided phrase');
    const session = input.sessionId ? this.sessions.find(input.sessionId) : null;
    const language = input.language ?? session?.language;
    if (!language) {
      throw new ValidationError('Invalid save guided phrase request', [
        'language is required when no active session is given',
      ]);
    }

    const parsed = parseGuidedPhrase(input.text, language);
    return this.savePhrase({
      ...parsed,
      context: input.context,
      complexityLevel: session?.complexityLevel ?? 1,
    });
  }

  /**
   * due 표현 전체 (nextDueAt 오름차순), 재순회 가능
   * limit을 주면 앞에서부터 자름
   */
  listDue(options: ListDueOptions = {}): Iterable<VocabularyPhrase> {
    const { now = this.clock(), limit } = options;
    return this.listDueUseCase.execute({ now, limit });
  }

  /**
   * 복습 화면용: 가장 오래 밀린 표현부터 review.dueLimit개
   */
  getDueReviews(now: Date = this.clock()): VocabularyPhrase[] {
    return [...this.listDue({ now, limit: this.settings.review.dueLimit })];
  }

  async markReviewed(request: MarkReviewedRequest): Promise<CompleteReviewOutput> {
    const input = parseRequest(MarkReviewedSchema, request, 'mark reviewed');
    return this.withPersistenceRetry('mark reviewed', () =>
      this.completeReviewUseCase.execute(input)
    );
  }

  groupByDifficulty(): Map<number, VocabularyPhrase[]> {
    return this.groupByDifficultyUseCase.execute();
  }

  getStatistics(now: Date = this.clock()): VocabularyStatistics {
    return this.trackVocabularyUseCase.execute(now);
  }

  listVocabulary(): VocabularyPhrase[] {
    return this.store.all();
  }

  // ===========================================================================
  // Private Methods
  // ===========================================================================

  private buildTurnContext(
    session: SessionPerformance,
    instruction: string,
    userText?: string
  ): TutorTurnContext {
    return {
      sessionId: session.sessionId,
      language: session.language,
      scenario: session.scenario,
      mode: session.mode,
      complexityLevel: session.complexityLevel,
      instruction,
      guidelines: this.tracker.getLevelGuidelines(session.complexityLevel),
      ...(userText !== undefined && { userText }),
    };
  }

  /**
   * 업스트림 API 오류는 그대로 호출자에게 전달
   */
  private async requestReply(context: TutorTurnContext): Promise<string | undefined> {
    if (!this.conversation) return undefined;

    try {
      return await this.conversation.generateReply(context);
    } catch (error) {
      console.error(`${LOG_TAG} Conversation collaborator failed:`, error);
      throw error;
    }
  }

  /**
   * 영속화 실패는 한 번 재시도 후 보고
   * 실패한 변경은 메모리에 반영되지 않았으므로 재실행해도 안전
   */
  private async withPersistenceRetry<T>(label: string, operation: () => Promise<T>): Promise<T> {
    try {
      return await operation();
    } catch (error) {
      if (!(error instanceof PersistenceError)) throw error;
      console.error(`${LOG_TAG} ${label} failed to persist, retrying once:`, error);
    }

    try {
      return await operation();
    } catch (error) {
      console.error(`${LOG_TAG} ${label} failed:`, error);
      throw error;
    }
  }

  private debug(message: string): void {
    if (this.settings.advanced.debugMode) {
      console.log(`${LOG_TAG} ${message}`);
    }
  }
}
