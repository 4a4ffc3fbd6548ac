import { spawn } from 'child_process';
import type { SpawnOptions } from 'child_process';
import { errorMessage } from '../errors.js';

/** Speaks short phrases without blocking the caller */
export interface Announcer {
  speak(text: string): void;
}

/** The part of a child process the announcer touches */
export interface SpeechProcess {
  on(event: 'error', listener: (err: Error) => void): unknown;
  unref(): void;
}

export type SpawnFn = (command: string, args: string[], options: SpawnOptions) => SpeechProcess;

const SPEECH_COMMANDS: Partial<Record<NodeJS.Platform, string>> = {
  darwin: 'say',
  linux: 'espeak',
};

/** Hands each phrase to a text-to-speech command and forgets about it */
export class CommandAnnouncer implements Announcer {
  constructor(private command: string, private spawnFn: SpawnFn = spawn) {}

  speak(text: string) {
    try {
      const child = this.spawnFn(this.command, [text], { stdio: 'ignore', detached: true });
      child.on('error', (err) => {
        console.debug(`🔊 ${this.command} failed: ${err.message}`);
      });
      child.unref();
    } catch (err) {
      console.debug(`🔊 ${this.command} failed: ${errorMessage(err)}`);
    }
  }
}

class SilentAnnouncer implements Announcer {
  speak(text: string) {
    console.debug(`🔊 (no speech on this platform) ${text}`);
  }
}

export function createPlatformAnnouncer(platform: NodeJS.Platform = process.platform, spawnFn?: SpawnFn): Announcer {
  const command = SPEECH_COMMANDS[platform];
  if (!command) {
    console.warn(`🔊 No text-to-speech command known for ${platform}; announcements are silent`);
    return new SilentAnnouncer();
  }
  return new CommandAnnouncer(command, spawnFn);
}
