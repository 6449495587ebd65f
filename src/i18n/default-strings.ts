export type MessageKey =
  | 'header_title'
  | 'platforms_title'
  | 'start_processing'
  | 'fetching_software'
  | 'fetching_games'
  | 'found_games'
  | 'processing_ready'
  | 'estimated_time'
  | 'press_enter'
  | 'test_mode_limit'
  | 'progress'
  | 'added_games'
  | 'created_queue'
  | 'skipped_denuvo'
  | 'no_games'
  | 'no_valid_games'
  | 'error'
  | 'cancelled';

export const DEFAULT_LANGUAGE = 'english';

export const DEFAULT_STRINGS: Record<MessageKey, string> = {
  header_title: 'SUPER STEAM PACKER QUEUE CREATOR',
  platforms_title: 'TARGET PLATFORMS',
  start_processing: 'Starting Steam game processing...',
  fetching_software: 'Fetching software list...',
  fetching_games: 'Fetching games list...',
  found_games: 'Found {} games in Steam library',
  processing_ready: 'Ready to process {} games...',
  estimated_time: 'Estimated completion time: {} (HH:MM:SS)',
  press_enter: 'Press Enter to start processing (This will take some time)',
  test_mode_limit: 'Test mode: Reached limit of {} games',
  progress: 'Progress: {}% | Time remaining: {} | Games: {}/{} | Denuvo: {}',
  added_games: 'Added {} games to {}',
  created_queue: 'Created queue with {} entries',
  skipped_denuvo: 'Skipped {} games with Denuvo',
  no_games: 'No new games to process',
  no_valid_games: 'No valid games found for queue',
  error: 'Error: {}',
  cancelled: 'Operation cancelled by user',
};

export function isMessageKey(key: string): key is MessageKey {
  return Object.prototype.hasOwnProperty.call(DEFAULT_STRINGS, key);
}
