export { users } from './users.js';
export { gameSessions } from './game-sessions.js';
export { decisionRecords } from './decision-records.js';
