import { BurnEvent } from '../domain/types';
import { BurnEmitter } from './burn-emitter';

export interface DiscordWebhookPayload {
    content?: string;
    embeds?: Array<{
        title?: string;
        description?: string;
        color?: number;
        fields?: Array<{
            name: string;
            value: string;
            inline?: boolean;
        }>;
        timestamp?: string;
    }>;
}

type FetchFn = (url: string, init: { method: string; headers: Record<string, string>; body: string }) => Promise<{
    ok: boolean;
    status: number;
    statusText: string;
}>;

export class DiscordBurnNotifier implements BurnEmitter {
    private readonly webhookUrl: string;
    private readonly fetchFn: FetchFn;

    constructor(webhookUrl: string, fetchFn: FetchFn = fetch) {
        this.webhookUrl = webhookUrl;
        this.fetchFn = fetchFn;
    }

    async emit(event: BurnEvent): Promise<void> {
        await this.send(buildBurnPayload(event));
    }

    // Throws on a non-2xx answer; the composite emitter logs it.
    async send(payload: DiscordWebhookPayload): Promise<void> {
        const response = await this.fetchFn(this.webhookUrl, {
            method: 'POST',
            headers: {
                'Content-Type': 'application/json',
            },
            body: JSON.stringify(payload),
        });

        if (!response.ok) {
            throw new Error(`Discord webhook failed: ${response.status} ${response.statusText}`);
        }
    }
}

export function buildBurnPayload(event: BurnEvent): DiscordWebhookPayload {
    const fields = [
        {
            name: '🪙 Mint',
            value: `\`${event.mint}\``,
            inline: false,
        },
        {
            name: '👛 Source Account',
            value: `\`${event.sourceAccount}\``,
            inline: false,
        },
        {
            name: '🔥 Amount (raw units)',
            value: event.amount.toString(),
            inline: true,
        },
    ];
    if (event.decimals !== undefined) {
        fields.push({ name: '🔢 Decimals', value: String(event.decimals), inline: true });
    }
    fields.push({
        name: '🔗 Transaction',
        value: `[View on Solscan](https://solscan.io/tx/${event.signature})`,
        inline: false,
    });

    return {
        embeds: [
            {
                title: '🔥 Token Burn Detected',
                description: event.inner ? 'Burn executed through a program call.' : 'Burn instruction in transaction.',
                color: 0xff4500, // orange red
                fields,
                timestamp: new Date((event.blockTime ?? Math.floor(Date.now() / 1000)) * 1000).toISOString(),
            },
        ],
    };
}
