/**
 * EPG Module
 *
 * XMLTV time retention and channel-scoped reduction
 */

export type { EpgReduceConfig, EpgReduceStats } from './types';

export { DEFAULT_RETENTION_POLICY } from './retention';

export { reduceEpg, reduceEpgWithStats } from './epg-reducer';
