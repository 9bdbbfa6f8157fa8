import axios, { type AxiosAdapter } from 'axios';
import { describeError } from './errors.js';
import { createLogger } from './logger.js';
import type { SavedArtwork } from './db.js';

const log = createLogger('notify');

const SLACK_WEBHOOK_PREFIX = 'https://hooks.slack.com/';
const MAX_LISTED_ARTWORKS = 10;

export interface NotificationResult {
  sent: boolean;
  error?: string;
}

interface SlackBlock {
  type: string;
  text?: { type: string; text: string; emoji?: boolean };
  fields?: { type: string; text: string }[];
  elements?: { type: string; text: string }[];
}

function formatPrice(price: number | null, currency: string): string {
  return price === null ? 'no price' : `${currency} ${price.toLocaleString('en-US')}`;
}

export function buildNewArtworkBlocks(artworks: SavedArtwork[]): SlackBlock[] {
  const blocks: SlackBlock[] = [
    {
      type: 'header',
      text: {
        type: 'plain_text',
        text: `${artworks.length} new possible Dan Brown listing${artworks.length === 1 ? '' : 's'}`,
        emoji: true,
      },
    },
  ];

  for (const { result } of artworks.slice(0, MAX_LISTED_ARTWORKS)) {
    const { listing } = result;
    const signals = Object.keys(result.positive_signals).join(', ') || 'none';
    blocks.push({
      type: 'section',
      text: {
        type: 'mrkdwn',
        text:
          `*<${listing.source_url}|${listing.title}>*\n` +
          `${listing.platform} · ${formatPrice(listing.price, listing.currency)} · ` +
          `score ${result.confidence_score}\nSignals: ${signals}`,
      },
    });
  }

  if (artworks.length > MAX_LISTED_ARTWORKS) {
    blocks.push({
      type: 'context',
      elements: [{ type: 'mrkdwn', text: `…and ${artworks.length - MAX_LISTED_ARTWORKS} more` }],
    });
  }

  return blocks;
}

/** Slack incoming-webhook notifier. A missing webhook URL disables it. */
export class SlackNotifier {
  constructor(
    private readonly webhookUrl: string,
    private readonly adapter?: AxiosAdapter
  ) {}

  isConfigured(): boolean {
    return this.webhookUrl.startsWith(SLACK_WEBHOOK_PREFIX);
  }

  /** Never throws; delivery failures are logged and reported in the result. */
  async notifyNewArtworks(artworks: SavedArtwork[]): Promise<NotificationResult> {
    if (artworks.length === 0) return { sent: false };

    if (!this.webhookUrl) {
      log.debug('Slack webhook not configured, skipping notification');
      return { sent: false };
    }
    if (!this.isConfigured()) {
      log.warn('Invalid Slack webhook URL format');
      return { sent: false, error: 'Invalid webhook URL format' };
    }

    try {
      await axios.post(
        this.webhookUrl,
        { text: `${artworks.length} new artwork listing(s) found`, blocks: buildNewArtworkBlocks(artworks) },
        { timeout: 10_000, adapter: this.adapter }
      );
      log.info('Slack notification sent', { artworks: artworks.length });
      return { sent: true };
    } catch (error) {
      const message = describeError(error);
      log.error('Failed to send Slack notification', { error: message });
      return { sent: false, error: message };
    }
  }
}
