export class PipelineError extends Error {
    constructor(message: string) {
        super(message);
        this.name = 'PipelineError';
    }
}

export class DagCycleError extends PipelineError {
    constructor(public readonly models: readonly string[]) {
        super(`Model graph contains a cycle through: ${models.join(', ')}`);
        this.name = 'DagCycleError';
    }
}

export class DuplicateModelError extends PipelineError {
    constructor(public readonly table: string) {
        super(`More than one model writes table "${table}"`);
        this.name = 'DuplicateModelError';
    }
}

export class MissingDependencyError extends PipelineError {
    constructor(
        public readonly model: string,
        public readonly table: string
    ) {
        super(`Model "${model}" depends on "${table}", which is neither a source nor a model`);
        this.name = 'MissingDependencyError';
    }
}

export class UndeclaredDependencyError extends PipelineError {
    constructor(
        public readonly model: string,
        public readonly table: string
    ) {
        super(`Model "${model}" read "${table}" without declaring it as a dependency`);
        this.name = 'UndeclaredDependencyError';
    }
}

export class UniqueKeyViolationError extends PipelineError {
    constructor(
        public readonly model: string,
        public readonly key: string
    ) {
        super(`Model "${model}" produced more than one row for key "${key}"`);
        this.name = 'UniqueKeyViolationError';
    }
}

export class ModelExecutionError extends PipelineError {
    constructor(
        public readonly model: string,
        public readonly cause: unknown
    ) {
        const reason = cause instanceof Error ? cause.message : String(cause);
        super(`Model "${model}" failed: ${reason}`);
        this.name = 'ModelExecutionError';
    }
}

export class PipelineAbortedError extends PipelineError {
    constructor(
        public readonly completed: readonly string[],
        public readonly pending: readonly string[]
    ) {
        super(`Pipeline run aborted with ${pending.length} model(s) pending`);
        this.name = 'PipelineAbortedError';
    }
}

export class InvalidPipelineConfigError extends PipelineError {
    constructor(
        public readonly source: string,
        public readonly issues: readonly string[]
    ) {
        super(`Invalid pipeline config from ${source}: ${issues.join('; ')}`);
        this.name = 'InvalidPipelineConfigError';
    }
}

export class InvalidSourceRowError extends PipelineError {
    constructor(
        public readonly source: string,
        public readonly rowIndex: number,
        public readonly issues: readonly string[]
    ) {
        super(`Row ${rowIndex} of source "${source}" is invalid: ${issues.join('; ')}`);
        this.name = 'InvalidSourceRowError';
    }
}

// Failures a run can be restarted from without changing code or config
export function isRestartable(error: unknown): boolean {
    if (error instanceof PipelineAbortedError) return true;
    if (error instanceof ModelExecutionError) {
        return !(error.cause instanceof PipelineError);
    }
    return false;
}
