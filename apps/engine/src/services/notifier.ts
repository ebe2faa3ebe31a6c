export interface Notification {
    execution_id: string;
    step: string;
    message: string;
}

export interface Notifier {
    notify(notification: Notification): Promise<void>;
}

export class ConsoleNotifier implements Notifier {
    async notify({ execution_id, step, message }: Notification): Promise<void> {
        console.log(`[notify] execution ${execution_id} step "${step}": ${message}`);
    }
}

/** POSTs each notification as JSON to a webhook. */
export class WebhookNotifier implements Notifier {
    constructor(private readonly url: string, private readonly timeoutMs = 5000) { }

    async notify(notification: Notification): Promise<void> {
        const res = await fetch(this.url, {
            method: 'POST',
            headers: { 'content-type': 'application/json' },
            body: JSON.stringify(notification),
            signal: AbortSignal.timeout(this.timeoutMs),
        });
        if (!res.ok) {
            throw new Error(`Notification webhook answered ${res.status}`);
        }
    }
}
