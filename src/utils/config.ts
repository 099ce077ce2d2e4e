/**
 * CLI presentation settings
 */
export const config = {
  /**
   * Whether to include emojis in output (can be disabled for non-unicode terminals)
   */
  get useEmoji(): boolean {
    return process.env.KBFORGE_NO_EMOJI !== '1';
  },
};

/**
 * Get icon based on emoji setting
 */
export function getIcon(emoji: string, fallback: string = ''): string {
  return config.useEmoji ? emoji : fallback;
}
