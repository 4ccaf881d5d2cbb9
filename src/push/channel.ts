import type { DeliverableArtifact } from '../fetch/pipeline.js';

export interface DeliveryTarget {
  destinationId: string;
  topicId?: string | null;
}

export type ActionKind = 'hd' | 'audio' | 'urls';

/**
 * A button attached to a delivered message: either a callback carrying
 * `<kind>|<token>` or a plain link.
 */
export type ActionButton =
  | { type: 'callback'; label: string; kind: ActionKind; token: string }
  | { type: 'url'; label: string; url: string };

/** Rows of buttons, rendered top to bottom. */
export type ActionLayout = ActionButton[][];

/**
 * Outbound side of the chat platform. Implementations throw DeliveryError:
 * `permanent` for rejections that will never succeed, transient otherwise.
 */
export interface NotificationChannel {
  /** One album of at most the platform's album limit. */
  sendBatch(target: DeliveryTarget, artifacts: readonly DeliverableArtifact[]): Promise<void>;
  sendSingle(
    target: DeliveryTarget,
    artifact: DeliverableArtifact,
    caption: string,
    actions?: ActionLayout,
  ): Promise<void>;
  sendMessage(target: DeliveryTarget, text: string, actions?: ActionLayout): Promise<void>;
  /** Sends a file as a document to a user (secondary actions reply privately). */
  sendDocument(target: DeliveryTarget, filePath: string): Promise<void>;
}

export function encodeCallbackData(kind: ActionKind, token: string): string {
  return `${kind}|${token}`;
}

export function isActionKind(value: string): value is ActionKind {
  return value === 'hd' || value === 'audio' || value === 'urls';
}
