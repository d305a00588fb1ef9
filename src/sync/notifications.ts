import type { Logger } from '../logging.js';

export interface NotificationField {
  name: string;
  value: string;
}

export interface Notification {
  channelId: string;
  content: string;
  embed?: {
    title: string;
    description: string;
    fields: NotificationField[];
    footer?: string;
  };
}

/** Fire-and-forget delivery to a chat channel. */
export interface Notifier {
  send(notification: Notification): Promise<void>;
}

export class ConsoleNotifier implements Notifier {
  constructor(private readonly logger: Logger = console) {}

  async send(notification: Notification): Promise<void> {
    this.logger.log('notification', {
      channelId: notification.channelId,
      content: notification.content,
      title: notification.embed?.title,
    });
  }
}

export class WebhookNotifier implements Notifier {
  private readonly fetchImpl: typeof fetch;
  private readonly timeoutMs: number;

  constructor(
    private readonly url: string,
    options: { fetchImpl?: typeof fetch; timeoutMs?: number } = {}
  ) {
    this.fetchImpl = options.fetchImpl ?? globalThis.fetch.bind(globalThis);
    this.timeoutMs = options.timeoutMs ?? 10_000;
  }

  async send(notification: Notification): Promise<void> {
    const response = await this.fetchImpl(this.url, {
      method: 'POST',
      headers: { 'Content-Type': 'application/json' },
      body: JSON.stringify({
        channel_id: notification.channelId,
        content: notification.content,
        embed: notification.embed ?? null,
      }),
      signal: AbortSignal.timeout(this.timeoutMs),
    });
    if (!response.ok) {
      throw new Error(`Notification webhook responded with status ${response.status}`);
    }
  }
}

export const missingItemMessage = (input: {
  discordId: string;
  itemName: string;
  position: string;
  crimeName: string;
  crimeId: number;
}) =>
  `<@${input.discordId}> You need to get **${input.itemName}** for the **${input.position}** slot in crime **${input.crimeName}** (ID: ${input.crimeId})`;

const formatMinute = (date: Date) => date.toISOString().slice(0, 16).replace('T', ' ');

export const frequentLeaverNotification = (input: {
  channelId: string;
  factionId: number;
  playerId: number;
  leaveCount: number;
  threshold: number;
  windowDays: number;
  leadIds: string[];
  recentLeaves: Array<{ crimeId: number; occurredAt: Date }>;
}): Notification => {
  const fields: NotificationField[] = [
    { name: 'Player', value: `ID: ${input.playerId}` },
    { name: 'Leaves', value: `${input.leaveCount} (threshold: ${input.threshold})` },
  ];
  if (input.recentLeaves.length) {
    fields.push({
      name: 'Recent Crimes Left',
      value: input.recentLeaves
        .slice(0, 5)
        .map((leave) => `Crime ${leave.crimeId} (${formatMinute(leave.occurredAt)})`)
        .join('\n'),
    });
  }
  return {
    channelId: input.channelId,
    content: input.leadIds.map((id) => `<@${id}>`).join(' '),
    embed: {
      title: 'Frequent Crime Leaver Detected',
      description: `Player has left ${input.leaveCount} crime(s) in the last ${input.windowDays} days`,
      fields,
      footer: `Faction ID: ${input.factionId}`,
    },
  };
};
