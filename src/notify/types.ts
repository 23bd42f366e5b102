/** A downloadable file named in a single-sample notice */
export interface NoticeLink {
  filename: string;
  url: string;
}

/**
 * Sends share notices to recipients.
 *
 * Delivery failure resolves to false; implementations never reject and
 * never retry.
 */
export interface NotificationGateway {
  sendSingleNotice(recipient: string, sampleId: string, urls: NoticeLink[], ttlDays: number): Promise<boolean>;
  sendMultiNotice(recipient: string, sampleIds: string[], container: string, ttlDays: number): Promise<boolean>;
}

/** Rendered message ready for a transport */
export interface RenderedNotice {
  subject: string;
  html: string;
  text: string;
}
