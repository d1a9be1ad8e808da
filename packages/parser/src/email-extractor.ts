import { simpleParser } from "mailparser";
import type { ExtractedItem, ExtractionContext, ExtractionFailure, ExtractionInput, ExtractionResult, IExtractor } from "./extractor.interface.js";
import { htmlToText } from "./html.js";
import { extensionOf } from "./media-types.js";

/**
 * RFC 822 messages: the body is one item, and each named attachment is
 * dispatched back through the registry.
 */
export class EmailExtractor implements IExtractor {
  readonly kind = "email";

  async extract(input: ExtractionInput, context: ExtractionContext): Promise<ExtractionResult> {
    const mail = await simpleParser(Buffer.from(input.content));
    const items: ExtractedItem[] = [];
    const failures: ExtractionFailure[] = [];

    const body = mail.text?.trim() || (mail.html ? htmlToText(mail.html) : "");
    if (body) {
      items.push({
        text: body,
        metadata: {
          title: mail.subject ?? null,
          messageId: mail.messageId ?? null,
          createdAt: mail.date ? mail.date.toISOString() : null,
        },
        identity: "body",
      });
    }

    for (const [index, attachment] of mail.attachments.entries()) {
      const fileName = attachment.filename;
      if (!fileName) continue;

      const nested = await context.dispatch({
        content: attachment.content,
        mediaType: attachment.contentType,
        fileName,
      });

      for (const item of nested.items) {
        items.push({
          text: item.text,
          metadata: {
            ...item.metadata,
            attachmentName: fileName,
            title: fileName,
            ext: extensionOf(fileName).replace(/^\./, ""),
          },
          identity: item.identity ? `attachment-${index}-${item.identity}` : `attachment-${index}`,
        });
      }
      failures.push(...nested.failures.map((failure) => ({ ...failure, fileName: failure.fileName ?? fileName })));
    }

    return { items, failures };
  }
}
