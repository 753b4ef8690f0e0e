import { CallbackRegistrationError } from './errors';

export type DispatchResult = 'delivered' | 'already_consumed' | 'unknown_token';

export type CallbackReceiver<E> = (event: E) => void;

/**
 * One-shot callback registrations keyed by single-use correlation tokens.
 *
 * A token fires at most once. Its registration is removed before the receiver
 * runs, so a receiver that throws or a duplicate delivery can never unregister
 * twice. Tokens that fired or were cancelled are remembered as consumed and
 * cannot be registered again.
 */
export class CallbackRegistry<E> {
    private pending: Map<string, CallbackReceiver<E>> = new Map();
    private consumed: Set<string> = new Set();

    constructor(private readonly maxConsumedTokens = 1000) { }

    register(token: string, receiver: CallbackReceiver<E>): void {
        if (!token) {
            throw new CallbackRegistrationError('Callback token must not be empty');
        }
        if (this.pending.has(token) || this.consumed.has(token)) {
            throw new CallbackRegistrationError(`Callback token ${token} is already in use`);
        }
        this.pending.set(token, receiver);
    }

    dispatch(token: string, event: E): DispatchResult {
        const receiver = this.pending.get(token);
        if (!receiver) {
            return this.consumed.has(token) ? 'already_consumed' : 'unknown_token';
        }

        this.consume(token);
        receiver(event);
        return 'delivered';
    }

    /**
     * Drops a pending registration without delivering. Returns false if nothing was pending.
     */
    cancel(token: string): boolean {
        if (!this.pending.has(token)) return false;
        this.consume(token);
        return true;
    }

    isPending(token: string): boolean {
        return this.pending.has(token);
    }

    pendingCount(): number {
        return this.pending.size;
    }

    private consume(token: string): void {
        this.pending.delete(token);
        this.consumed.add(token);

        // Oldest tokens go first; Set preserves insertion order
        if (this.consumed.size > this.maxConsumedTokens) {
            const oldest = this.consumed.values().next();
            if (!oldest.done) this.consumed.delete(oldest.value);
        }
    }
}
