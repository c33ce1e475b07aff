/**
 * IPTV Module
 *
 * M3U playlist filtering and channel retention
 */

export type { PlaylistFilterConfig, PlaylistFilterStats } from './types';

export { filterPlaylist } from './playlist-filter';
