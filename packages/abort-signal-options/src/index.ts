export type AbortSignalOptions = {
    timeout?: number;
    abortSignal?: AbortSignal,
};

/**
 * Merges the timeout, the caller's signal and any extra signals into one abort signal.
 * Throws the abort reason right away when that signal has already fired.
 */
export function resolveOptions<Options extends AbortSignalOptions>(
    options: Options,
    ...inherited: Array<AbortSignal | undefined>
): Options {
    const abortSignal = combineSignals(
        options.abortSignal,
        options.timeout === undefined ? undefined : AbortSignal.timeout(options.timeout),
        ...inherited,
    );

    maybeAbort(abortSignal);

    return {...options, abortSignal};
}

/**
 * A lone signal is returned as is, several are joined with `AbortSignal.any`.
 */
export function combineSignals(...signals: Array<AbortSignal | undefined>): AbortSignal | undefined {
    const present = signals.filter((signal): signal is AbortSignal => signal !== undefined);

    return present.length > 1 ? AbortSignal.any(present) : present[0];
}

export function maybeAbort(signal?: AbortSignal): void {
    if (signal !== undefined && signal.aborted) {
        throw signal.reason;
    }
}
