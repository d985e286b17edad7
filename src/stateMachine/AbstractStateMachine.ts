// src/stateMachine/AbstractStateMachine.ts

import type { ILogger } from '../@types/index.ts';

interface IStateMachineOptions {
    logger: ILogger;
    verbose: boolean;
}

export abstract class AbstractStateMachine<S, O extends IStateMachineOptions> {
    protected state: S;
    protected readonly options: O;
    protected stateTransitions: Array<{ state: S; handler: () => Promise<void> | void }>;

    protected constructor(initialState: S, options: O) {
        this.state = initialState;
        this.options = options;
        this.stateTransitions = [];
    }

    /**
     * Executes the transitions in `stateTransitions` in order, updating the state before each handler.
     * On failure the machine moves to the error state, logs which state failed and rethrows.
     */
    async run(): Promise<void> {
        try {
            for (const transition of this.stateTransitions) {
                this.transitionTo(transition.state);
                await transition.handler.bind(this)();
            }
            this.transitionTo(this.getCompletionState());
        } catch (error) {
            const failure = error instanceof Error ? error : new Error(String(error));
            this.transitionTo(this.getErrorState(), failure);
            this.handleError(failure);
        }
    }

    /**
     * Moves to `nextState`. Entering the error state with an error logs it;
     * any other transition is logged as a debug line in verbose mode.
     */
    protected transitionTo(nextState: S, error?: Error): void {
        const { logger } = this.options;
        if (nextState === this.getErrorState() && error) {
            logger.error(`Error occurred during "${this.state}": ${error.message}`);
            this.state = this.getErrorState();
        } else {
            if (this.options.verbose) {
                logger.debug(`STATE :: Transitioning from state "${this.state}" -> "${nextState}"`);
            }
            this.state = nextState;
        }
    }

    protected handleError(error: Error): never {
        throw error;
    }

    /**
     * Returns a value a previous state was expected to produce, failing loudly when it is missing.
     */
    protected require<T>(value: T | null, what: string): T {
        if (value === null) {
            throw new Error(`${what} is not available in state "${this.state}"`);
        }
        return value;
    }

    protected abstract getCompletionState(): S;
    protected abstract getErrorState(): S;
}
