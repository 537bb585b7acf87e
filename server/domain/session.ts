import { v4 as uuid } from "uuid";
import type { Session } from "./types.js";

export function createSession(now = new Date().toISOString(), id: string = uuid()): Session {
  return {
    id,
    createdAt: now,
    updatedAt: now,
    discovery: {
      stage: "ClarifyingCriteria",
      criteriaDraft: {},
      issuedQueries: [],
      candidates: [],
      dropped: [],
      handoffs: [],
      round: 0
    },
    outreach: {
      stage: "Idle",
      leads: [],
      databaseCandidates: [],
      sendPlans: [],
      receivedHandoffIds: []
    },
    approvals: [],
    logs: []
  };
}
