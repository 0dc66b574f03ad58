export {
  YouTubeClient,
  buildVideoUrl,
  isChannelHandle,
  parseChannelId,
  type VideoSource,
  type YouTubeClientOptions,
} from './client.js';
