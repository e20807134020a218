/**
 * Fixed user-facing texts
 */
export const MESSAGES = {
  notFound: '❌ Movie not found. Please check the name or ID and try again.',
  adminOnly: '❌ This command is for admins only.',
  genericError: '❌ An error occurred while processing your request. Please try again.',
  trendingUnavailable: '❌ Could not fetch trending movies. Please try again later.',
  popularUnavailable: '❌ Could not fetch popular movies. Please try again later.',
  searchUsage: 'Please provide a movie name. Example:\n`/search Avatar 2009`',
  idUsage: 'Please provide a valid TMDB ID. Example:\n`/id 27205`',
  broadcastUsage: 'Please provide a message to broadcast. Example:\n`/broadcast Hello users!`',
  noFavorites:
    "You haven't saved any favorites yet. Use the ❤️ button after searching for a movie to save it.",
  favoriteNotFound: 'Movie not found!',
  favoriteSaveFailed: '❌ Error saving to favorites',
  favoriteRemoveFailed: '❌ Error removing from favorites',
  viewFailed: '❌ Error loading movie',
} as const;

export const HEADINGS = {
  trending: '🔥 Currently trending movies',
  popular: '🌟 Most popular movies',
} as const;
