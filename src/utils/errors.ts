import {
    BadRequestException,
    ForbiddenException,
    HttpException,
    HttpStatus,
    InternalServerErrorException,
    NotFoundException,
} from '@nestjs/common';

export type PipelineStage =
    | 'validation'
    | 'contextualization'
    | 'augmentation'
    | 'retrieval'
    | 'ranking'
    | 'composition'
    | 'generation'
    | 'post-processing'
    | 'persistence';

export class RagValidationError extends BadRequestException {
    constructor(message: string, readonly issues: string[] = [message]) {
        super({ code: 'VALIDATION_ERROR', message, issues });
    }
}

export class ConversationNotFoundError extends NotFoundException {
    constructor(conversationId: string) {
        super({ code: 'CONVERSATION_NOT_FOUND', message: `Conversation ${conversationId} not found` });
    }
}

export class ConversationAccessError extends ForbiddenException {
    constructor(conversationId: string) {
        super({ code: 'CONVERSATION_FORBIDDEN', message: `You don't have access to conversation ${conversationId}` });
    }
}

export class FatalPipelineError extends InternalServerErrorException {
    constructor(readonly stage: PipelineStage, readonly reason: string, cause?: unknown) {
        super({ code: 'FATAL_PIPELINE_ERROR', stage, message: reason }, { cause });
    }
}

/** 499 mirrors the "client closed request" convention; nothing is persisted for a cancelled turn. */
export class PipelineCancelledError extends HttpException {
    constructor(readonly stage: PipelineStage) {
        super({ code: 'PIPELINE_CANCELLED', stage, message: `Turn cancelled during ${stage}` }, 499);
    }
}

export class GenerationTransientError extends Error {
    constructor(message: string, readonly status?: number, options?: { cause?: unknown }) {
        super(message, options);
        this.name = 'GenerationTransientError';
    }
}

export class GenerationFatalError extends Error {
    constructor(message: string, readonly status?: number, options?: { cause?: unknown }) {
        super(message, options);
        this.name = 'GenerationFatalError';
    }
}

const TRANSIENT_STATUSES = new Set<number>([
    HttpStatus.REQUEST_TIMEOUT,
    HttpStatus.TOO_MANY_REQUESTS,
    HttpStatus.INTERNAL_SERVER_ERROR,
    HttpStatus.BAD_GATEWAY,
    HttpStatus.SERVICE_UNAVAILABLE,
    HttpStatus.GATEWAY_TIMEOUT,
]);

export function isTransientStatus(status: number): boolean {
    return TRANSIENT_STATUSES.has(status);
}

export function errorStatus(error: unknown): number | undefined {
    if (typeof error === 'object' && error !== null && 'status' in error && typeof error.status === 'number') {
        return error.status;
    }
    return undefined;
}

export function errorMessage(error: unknown): string {
    return error instanceof Error ? error.message : String(error);
}
