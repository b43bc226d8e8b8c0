import { parseInboundEventType } from '../../domain/enums';
import { JsonObject, isJsonObject } from '../../domain/models';
import {
  InboundPayloadError,
  InboundWebhookContext,
  PipelineStage,
  StageResult,
  UnsupportedEventTypeError,
} from '../types';

/**
 * Stage 2: Parse
 * { event_id, event_type, timestamp, data: { token_id, ... } }
 */
export class ParseStage implements PipelineStage {
  name = 'parse';

  async execute(context: InboundWebhookContext): Promise<StageResult> {
    let body: unknown;
    try {
      body = JSON.parse(context.rawBody.toString('utf8'));
    } catch {
      throw new InboundPayloadError('Body is not valid JSON');
    }
    if (!isJsonObject(body)) {
      throw new InboundPayloadError('Body must be a JSON object');
    }

    const eventId = requireString(body, 'event_id');
    const eventTypeText = requireString(body, 'event_type');
    const timestampText = requireString(body, 'timestamp');

    const timestamp = new Date(timestampText);
    if (Number.isNaN(timestamp.getTime())) {
      throw new InboundPayloadError(`timestamp is not a valid date: ${timestampText}`, 'timestamp');
    }

    const data = body['data'];
    if (!isJsonObject(data)) {
      throw new InboundPayloadError('data must be an object', 'data');
    }
    const tokenId = data['token_id'];
    if (typeof tokenId !== 'string' || tokenId.trim().length === 0) {
      throw new InboundPayloadError('data.token_id is required', 'data.token_id');
    }

    const eventType = parseInboundEventType(eventTypeText);
    if (!eventType) {
      throw new UnsupportedEventTypeError(`Unsupported event type: ${eventTypeText}`, eventTypeText);
    }

    context.event = {
      eventId,
      eventType,
      timestamp,
      tokenId: tokenId.trim(),
      data,
      payload: body,
    };
    context.metadata.eventType = eventType;

    return { success: true, context, shouldContinue: true };
  }
}

function requireString(source: JsonObject, key: string): string {
  const value = source[key];
  if (typeof value !== 'string' || value.trim().length === 0) {
    throw new InboundPayloadError(`${key} is required`, key);
  }
  return value.trim();
}
