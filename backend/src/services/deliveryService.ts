import { z } from "zod";
import { ConfigMissingError, DeliveryError } from "../errors.js";
import type { DigestDelivery, OutgoingDigest } from "../types.js";

const RESEND_ENDPOINT = "https://api.resend.com/emails";

const resendResponseSchema = z.object({
  id: z.string().min(1)
});

export type ResendDeliveryOptions = {
  apiKey?: string;
  fetchImpl?: typeof fetch;
};

export function createResendDelivery(options: ResendDeliveryOptions): DigestDelivery {
  const fetchImpl = options.fetchImpl ?? fetch;

  return {
    async send(message: OutgoingDigest): Promise<{ id: string }> {
      const apiKey = options.apiKey?.trim();
      if (!apiKey) {
        throw new ConfigMissingError("RESEND_API_KEY");
      }

      let response: Response;
      try {
        response = await fetchImpl(RESEND_ENDPOINT, {
          method: "POST",
          headers: {
            "Content-Type": "application/json",
            Authorization: `Bearer ${apiKey}`
          },
          body: JSON.stringify({
            from: message.from,
            to: [message.to],
            subject: message.subject,
            html: message.html,
            text: message.text
          })
        });
      } catch (error) {
        throw new DeliveryError("Could not reach the email service.", { cause: error });
      }

      if (!response.ok) {
        const body = await response.text();
        throw new DeliveryError(`Resend request failed: ${response.status} ${body}`);
      }

      const parsed = resendResponseSchema.safeParse(await response.json());
      if (!parsed.success) {
        throw new DeliveryError("Resend response did not include a message id.");
      }
      return { id: parsed.data.id };
    }
  };
}
