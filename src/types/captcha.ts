// ==================== IMAGENS ====================

export type ChannelOrder = 'rgb' | 'bgr';

/**
 * Imagem decodificada: pixels intercalados (3 canais, 8 bits), linha a linha.
 * A ordem dos canais é explícita porque as conversões de cor dependem dela.
 */
export interface CapturedImage {
    width: number;
    height: number;
    channelOrder: ChannelOrder;
    data: Buffer;
}

export interface QuestionPair {
    left: CapturedImage;
    right: CapturedImage;
}

export interface CandidateCard<TElement> {
    /** Posição fixa na tela, de 1 a 6 */
    index: number;
    image: CapturedImage;
    element: TElement;
}

// ==================== RÓTULOS ====================

export const RANK_LABELS = [
    'ace', 'two', 'three', 'four', 'five', 'six', 'seven',
    'eight', 'nine', 'ten', 'jack', 'queen', 'king',
] as const;

export const SUIT_LABELS = ['clubs', 'diamonds', 'hearts', 'spades'] as const;

export const COLOR_LABELS = ['red', 'black'] as const;

export const UNKNOWN_LABEL = 'unknown';
export type UnknownLabel = typeof UNKNOWN_LABEL;

export type RankLabel = typeof RANK_LABELS[number];
export type SuitLabel = typeof SUIT_LABELS[number];
export type ColorLabel = typeof COLOR_LABELS[number];
export type CardLabel = RankLabel | SuitLabel | ColorLabel | UnknownLabel;

export type ClassificationResult =
    | { label: Exclude<CardLabel, UnknownLabel>; confidence: number }
    | { label: UnknownLabel; confidence?: undefined };

export const UNKNOWN_RESULT: ClassificationResult = { label: UNKNOWN_LABEL };

// ==================== MATCHING ====================

export type MatchStrategy = 'label' | 'similarity';

export interface MatchAssignment {
    /** Índice (1..6) da carta escolhida para a metade esquerda */
    left: number;
    /** Índice (1..6) da carta escolhida para a metade direita; nunca igual a left */
    right: number;
    strategy: MatchStrategy;
}

export interface LabeledImage {
    label: CardLabel;
    image: CapturedImage;
}

export interface LabeledCandidate extends LabeledImage {
    index: number;
}

// ==================== TENTATIVAS ====================

export type SolveState =
    | 'Idle'
    | 'Capturing'
    | 'Classifying'
    | 'Matching'
    | 'Submitting'
    | 'AwaitingAlert'
    | 'Success'
    | 'Exhausted';

export type AttemptOutcome =
    | { kind: 'Submitted'; detail?: string }
    | { kind: 'RejectedWithAlert'; detail?: string }
    | { kind: 'Error'; detail: string; error?: unknown };

// ==================== CAPACIDADES EXTERNAS ====================

/**
 * Acesso ao navegador consumido pelo solver.
 * Seletores são strings opacas (XPath ou CSS) vindas da configuração.
 */
export interface Viewport<TElement> {
    locateElement(selector: string): Promise<TElement | null>;
    captureRegion(element: TElement): Promise<CapturedImage>;
    /** Pode rejeitar com UnexpectedModalError quando um alert bloqueia o clique */
    click(element: TElement): Promise<void>;
    waitForCondition(predicate: () => Promise<boolean>, timeoutMs: number): Promise<boolean>;
    currentAlertText(): Promise<string | null>;
    dismissAlert(): Promise<void>;
}

export interface CardClassifier {
    classify(image: CapturedImage): Promise<ClassificationResult>;
}

export interface DebugImageSink {
    save(attempt: number, name: string, image: CapturedImage): Promise<void>;
    cleanup(): Promise<void>;
}

export interface CaptchaErrorSink {
    record(attempt: number, detail: string, error?: unknown): void;
}
