import { KnownChannel, type Channel } from '../types/index.js';
import { UnsupportedChannelError } from '../errors/PlayPushError.js';

export const CHANNEL_PACKAGE_NAMES: Readonly<Record<KnownChannel, string>> = {
  aurora: 'org.mozilla.fennec_aurora',
  beta: 'org.mozilla.firefox_beta',
  release: 'org.mozilla.firefox',
};

function isKnownChannel(channel: Channel): channel is KnownChannel {
  return Object.hasOwn(KnownChannel, channel);
}

export function getPackageName(channel: Channel): string {
  if (!isKnownChannel(channel)) {
    throw new UnsupportedChannelError(`No package name is known for channel "${channel}"`, {
      channel,
      knownChannels: Object.keys(CHANNEL_PACKAGE_NAMES),
    });
  }
  return CHANNEL_PACKAGE_NAMES[channel];
}
