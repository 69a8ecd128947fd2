export interface WebhookAcknowledgement {
  received: true;
  eventId: string;
  eventType: string;
  fulfilled: boolean;
}
