// src/stateMachine/AbstractStateMachine.ts

import type { ILogger, IProgressBar } from '../@types/index.js';

interface IStateMachineOptions {
    logger: ILogger;
    verbose: boolean;
    progressBar?: IProgressBar;
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

    get currentState(): S {
        return this.state;
    }

    /**
     * Executes the transitions in `stateTransitions` in order, invoking each handler.
     * On failure the machine moves to its error state and the error is rethrown.
     */
    async run(): Promise<void> {
        try {
            for (const transition of this.stateTransitions) {
                this.transitionTo(transition.state);
                await transition.handler.bind(this)();
            }
            this.transitionTo(this.getCompletionState());
        } catch (error) {
            const failure = this.normalizeError(error);
            this.transitionTo(this.getErrorState(), failure);
            this.handleError(failure);
        }
    }

    /**
     * Moves to `nextState`. Entering the error state with an error logs it;
     * any other transition is logged in verbose mode and advances the progress bar.
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
            if (this.options.progressBar) {
                this.options.progressBar.increment({ state: nextState });
            }
            this.state = nextState;
        }
    }

    protected handleError(error: Error): never {
        throw error;
    }

    protected abstract normalizeError(error: unknown): Error;
    protected abstract getCompletionState(): S;
    protected abstract getErrorState(): S;
}
