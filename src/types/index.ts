/**
 * comment-coder Type Definitions
 * Collection and dictionary coding of YouTube comments on elections
 */

// =============================================================================
// Labels
// =============================================================================

/**
 * Coding categories, in canonical order.
 * - VP: voting intention / encouragement to vote
 * - E_int: internal political efficacy (studying, judging for oneself)
 * - E_ext: external political efficacy (voting can change things)
 * - Cyn: cynicism (nothing will change)
 * - Norm: normative appeal (civic duty framing)
 * - Info: information seeking (where, how, which candidate)
 * - Mobi: mobilization (calls for collective action)
 */
export const LABELS = ['VP', 'E_int', 'E_ext', 'Cyn', 'Norm', 'Info', 'Mobi'] as const;

export type Label = (typeof LABELS)[number];

/** Build a label-keyed record, evaluating `fn` in canonical label order */
export function mapLabels<T>(fn: (label: Label) => T): Record<Label, T> {
  return {
    VP: fn('VP'),
    E_int: fn('E_int'),
    E_ext: fn('E_ext'),
    Cyn: fn('Cyn'),
    Norm: fn('Norm'),
    Info: fn('Info'),
    Mobi: fn('Mobi'),
  };
}

// =============================================================================
// Detection & Prediction
// =============================================================================

/** One matched trigger; offset is the first occurrence in the case-folded text */
export interface KeywordSpan {
  keyword: string;
  offset: number;
}

/** Every label is present; an empty list means not detected */
export type DetectionResult = Record<Label, readonly KeywordSpan[]>;

export type LabelVerdict = Record<Label, boolean>;

/** `<Label>_negated` for negation entries, then the priority rule ids */
export type NegationRuleId = `${Label}_negated`;

export type RuleId = NegationRuleId | 'Cyn_overrides_positive' | 'Mobi_enhances_VP';

export type PriorityTrace = readonly RuleId[];

export interface PredictionResult {
  labels: LabelVerdict;
  trace: PriorityTrace;
  /** Raw detector output, before negation and priority rules */
  detections: DetectionResult;
  /** Negation patterns that suppressed a label */
  negations: Partial<Record<Label, readonly KeywordSpan[]>>;
}

export type PredictionColumn = `pred_${Label}`;

export type PredictionColumns = Record<PredictionColumn, 0 | 1>;

// =============================================================================
// Dictionaries
// =============================================================================

export type LabelDictionaries = Record<Label, readonly string[]>;

/** Patterns that, when present anywhere in the text, cancel a detected label */
export interface NegationDictionary {
  /** Traced as `<label>_negated` when it fires */
  label: Label;
  patterns: readonly string[];
}

export interface LabelerDictionaries {
  labels: LabelDictionaries;
  negations: readonly NegationDictionary[];
}

// =============================================================================
// Comments & Videos
// =============================================================================

export type CommentOrder = 'time' | 'relevance';

export interface VideoInfo {
  videoId: string;
  publishedAt: string;
  title?: string;
  channel?: string;
}

export interface CommentRecord {
  commentId: string;
  videoId: string;
  /** Empty string when the video lookup failed */
  videoPublishedAt: string;
  publishedAt: string;
  updatedAt: string;
  likeCount: number;
  totalReplyCount: number;
  text: string;
  authorChannelId?: string;
}

/** Row shape read back from the comments table for coding */
export interface StoredComment {
  commentId: string;
  videoId: string;
  publishedAt: string | null;
  likeCount: number | null;
  totalReplyCount: number | null;
  /** null only in damaged databases; reported as invalid input */
  text: string | null;
}

export interface VideoCollectionResult {
  videoId: string;
  videoInfo: VideoInfo | null;
  comments: CommentRecord[];
  error: string | null;
}

// =============================================================================
// Configuration
// =============================================================================

export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

export interface AppConfig {
  youtubeApiKey?: string;
  dbPath: string;
  maxComments: number;
  maxWorkers: number;
  order: CommentOrder;
  includeDebug: boolean;
  logLevel: LogLevel;
}

export const DEFAULT_CONFIG: AppConfig = {
  dbPath: '~/.comment-coder/comments.db',
  maxComments: 500,   // per video
  maxWorkers: 3,
  order: 'time',
  includeDebug: true,
  logLevel: 'info',
};
