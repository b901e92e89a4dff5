export type CaptchaErrorCode =
    | 'ELEMENT_NOT_FOUND'
    | 'INVALID_IMAGE'
    | 'UNEXPECTED_MODAL'
    | 'VIEWPORT_LOST';

/**
 * Erro base do solver de CAPTCHA.
 * O código permite ao orquestrador distinguir falhas transitórias de falhas fatais.
 */
export class CaptchaError extends Error {
    constructor(
        message: string,
        public readonly code: CaptchaErrorCode,
        public readonly context?: Record<string, unknown>,
    ) {
        super(message);
        this.name = new.target.name;
        Object.setPrototypeOf(this, new.target.prototype);
    }

    toJSON(): Record<string, unknown> {
        return {
            name: this.name,
            code: this.code,
            message: this.message,
            context: this.context,
        };
    }
}

export class ElementNotFoundError extends CaptchaError {
    constructor(selector: string) {
        super(`Elemento não encontrado: ${selector}`, 'ELEMENT_NOT_FOUND', { selector });
    }
}

export class InvalidImageError extends CaptchaError {
    constructor(message: string, context?: Record<string, unknown>) {
        super(message, 'INVALID_IMAGE', context);
    }
}

/** Um alert do navegador apareceu durante uma ação (ex.: clique) */
export class UnexpectedModalError extends CaptchaError {
    constructor(public readonly alertText: string) {
        super(`Alert inesperado: ${alertText}`, 'UNEXPECTED_MODAL', { alertText });
    }
}

/** Navegador/página inacessível: não é tratado pelo solver, sobe para quem chamou */
export class ViewportLostError extends CaptchaError {
    constructor(message: string) {
        super(message, 'VIEWPORT_LOST');
    }
}

export function errorMessage(error: unknown): string {
    return error instanceof Error ? error.message : String(error);
}
