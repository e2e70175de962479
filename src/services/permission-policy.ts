export type PermissionSubject = 'actor' | 'channel';

export interface PermissionDecision {
    subject: PermissionSubject;
    id: string;
    allowed: boolean;
    reason: string;
}

export interface PermissionPolicyOptions {
    /** Channels that may open incidents. Empty allows every channel. */
    allowedChannels?: readonly string[];
    /** Users that may change incident status. Empty allows everyone. */
    allowedActors?: readonly string[];
}

/** Allow-list checks in front of the lifecycle. */
export class PermissionPolicy {
    readonly #allowedChannels: ReadonlySet<string>;
    readonly #allowedActors: ReadonlySet<string>;

    // Optional hook for observing every decision
    public onDecision?: (decision: PermissionDecision) => void;

    constructor(options: PermissionPolicyOptions = {}) {
        this.#allowedChannels = new Set(options.allowedChannels ?? []);
        this.#allowedActors = new Set(options.allowedActors ?? []);
    }

    public isActorAllowed(actorId: string): boolean {
        return this.#decide('actor', actorId, this.#allowedActors).allowed;
    }

    public isChannelAllowed(channelId: string): boolean {
        return this.#decide('channel', channelId, this.#allowedChannels).allowed;
    }

    #decide(subject: PermissionSubject, id: string, allowList: ReadonlySet<string>): PermissionDecision {
        const decision: PermissionDecision =
            allowList.size === 0
                ? { subject, id, allowed: true, reason: `No ${subject} allow-list configured` }
                : allowList.has(id)
                  ? { subject, id, allowed: true, reason: `${subject} is on the allow-list` }
                  : { subject, id, allowed: false, reason: `${subject} is not on the allow-list` };

        this.onDecision?.(decision);
        return decision;
    }
}
