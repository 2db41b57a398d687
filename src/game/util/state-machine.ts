/**
 * Lightweight declarative state machine utility.
 *
 * Usage:
 *   const definition = defineStateMachine<SessionContext, 'start' | 'cancel'>()({
 *       idle: {
 *           transitions: { start: 'active' },
 *       },
 *       active: {
 *           transitions: { cancel: 'idle' },
 *           onExit: (ctx) => { ctx.preview = null; },
 *       },
 *   });
 *
 *   const sm = definition.create('idle', { preview: null });
 *   sm.send('start');
 */

export interface StateConfig<TState extends string, TEvent extends string, TContext> {
    /** Valid transitions: { eventName: targetState } */
    transitions?: Partial<Record<TEvent, TState>>;
    onEnter?: (ctx: TContext) => void;
    onExit?: (ctx: TContext) => void;
}

/** Observer called after every completed transition */
export type TransitionListener<TState extends string, TEvent extends string> =
    (from: TState, to: TState, event: TEvent) => void;

/** Reusable state machine template */
export interface StateMachineDefinition<TState extends string, TEvent extends string, TContext> {
    create(initialState: TState, context: TContext): StateMachine<TState, TEvent, TContext>;
    readonly states: readonly TState[];
}

export interface StateMachine<TState extends string, TEvent extends string, TContext> {
    readonly state: TState;
    /** Context object (mutable) */
    readonly context: TContext;
    /** Whether `event` leads anywhere from the current state */
    can(event: TEvent): boolean;
    /** Returns true if a transition occurred */
    send(event: TEvent): boolean;
    onTransition(listener: TransitionListener<TState, TEvent>): void;
}

/**
 * Define a state machine. Curried so the state names are inferred
 * from the config while context and events are given explicitly:
 *   defineStateMachine<MyContext, MyEvent>()({ ... })
 */
export function defineStateMachine<TContext, TEvent extends string>() {
    return function <TState extends string>(
        config: Record<TState, StateConfig<TState, TEvent, TContext>>
    ): StateMachineDefinition<TState, TEvent, TContext> {
        const states = Object.keys(config) as TState[];

        return {
            states,
            create(initialState, context) {
                let current = initialState;
                const listeners: Array<TransitionListener<TState, TEvent>> = [];

                config[current].onEnter?.(context);

                return {
                    get state() {
                        return current;
                    },

                    get context() {
                        return context;
                    },

                    can(event) {
                        return config[current].transitions?.[event] !== undefined;
                    },

                    send(event) {
                        const target = config[current].transitions?.[event];
                        if (target === undefined || target === current) return false;

                        const from = current;
                        config[from].onExit?.(context);
                        current = target;
                        config[current].onEnter?.(context);

                        for (const listener of listeners) {
                            listener(from, current, event);
                        }
                        return true;
                    },

                    onTransition(listener) {
                        listeners.push(listener);
                    },
                };
            },
        };
    };
}
