import { z } from 'zod';
import { decoded, SubResponseType, type BatchResponse } from '@relaypost/batch';
import { logger } from '@relaypost/shared';
import type { BatchRequest } from '../server-client.js';
import { Outcome, outcomeForError, parseDetails, type JobExecutor } from './types.js';

const log = logger.child({ module: 'open-group-rooms' });

export const openGroupDetailsSchema = z.object({ server: z.string().min(1) });

export const CapabilitiesResponse = SubResponseType.optional(
  'Capabilities',
  z.object({ capabilities: z.array(z.string()) }),
);

export const RoomsResponse = SubResponseType.of(
  'Rooms',
  z.array(
    z.object({
      token: z.string().min(1),
      name: z.string(),
      active_users: z.number().int().nonnegative().default(0),
    }),
  ),
);

export const OPEN_GROUP_REQUESTS: readonly BatchRequest[] = [
  { method: 'GET', path: '/capabilities' },
  { method: 'GET', path: '/rooms' },
];

export const retrieveDefaultOpenGroupRoomsExecutor: JobExecutor = {
  async execute(job, deps, signal) {
    const details = parseDetails(job, openGroupDetailsSchema);
    if (!details.success) return Outcome.permanentFailure(`invalid details: ${details.error}`);

    let batch: BatchResponse;
    try {
      batch = await decoded(deps.api.batch(OPEN_GROUP_REQUESTS, signal), [CapabilitiesResponse, RoomsResponse]);
    } catch (err) {
      return outcomeForError(err);
    }

    const capabilities = batch.get(0, CapabilitiesResponse);
    if (capabilities?.body) log.debug({ capabilities: capabilities.body.capabilities }, 'open group capabilities');

    const rooms = batch.get(1, RoomsResponse);
    if (!rooms || rooms.code >= 400) {
      return Outcome.temporaryFailure(`rooms request returned ${rooms?.code ?? 'nothing'}`);
    }
    if (!rooms.body) {
      return Outcome.temporaryFailure(rooms.failedToParseBody ? 'rooms body failed to parse' : 'rooms body missing');
    }

    const list = rooms.body.map((room) => ({ token: room.token, name: room.name, activeUsers: room.active_users }));
    const { server } = details.data;
    log.info({ server, rooms: list.length }, 'retrieved default open group rooms');
    return Outcome.success({ commit: () => deps.storage.replaceOpenGroupRooms(server, list, deps.now()) });
  },
};
