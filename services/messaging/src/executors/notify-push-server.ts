import { z } from 'zod';
import { Outcome, outcomeForError, parseDetails, type JobExecutor } from './types.js';

export const pushDetailsSchema = z.object({ token: z.string().min(1) });

export const notifyPushServerExecutor: JobExecutor = {
  maxFailureCount: 4,

  async execute(job, deps, signal) {
    const details = parseDetails(job, pushDetailsSchema);
    if (!details.success) return Outcome.permanentFailure(`invalid details: ${details.error}`);
    if (!deps.keys.fetch()) return Outcome.permanentFailure('no identity keys to register with');

    const { token } = details.data;
    const signature = deps.crypto.sign(new TextEncoder().encode(token));
    try {
      await deps.api.registerPushToken(
        {
          token,
          identityId: deps.crypto.identityId,
          publicKey: deps.crypto.signingPublicKey,
          signature: Buffer.from(signature).toString('base64'),
        },
        signal,
      );
      return Outcome.success();
    } catch (err) {
      return outcomeForError(err);
    }
  },
};
