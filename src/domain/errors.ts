/**
 * Thrown when a selection is attempted against a catalogue with no tracks.
 */
export class EmptyCatalogueError extends Error {
  constructor(message = 'the music library has no playable tracks') {
    super(message);
    this.name = 'EmptyCatalogueError';
  }
}

/**
 * The external player could not be started for a track. Fatal to the session:
 * an environment that cannot launch the player will fail for every track.
 */
export class LaunchError extends Error {
  public readonly path: string;

  constructor(path: string, reason: string, options?: { cause?: unknown }) {
    super(`failed to start playback of "${path}": ${reason}`, options);
    this.name = 'LaunchError';
    this.path = path;
  }
}

export class LibraryNotFoundError extends Error {
  constructor(public readonly library: string) {
    super(`Library "${library}" does not exist!`);
    this.name = 'LibraryNotFoundError';
  }
}

export class EmptyLibraryError extends Error {
  constructor(public readonly root: string) {
    super(`Could not find any music files under "${root}"!`);
    this.name = 'EmptyLibraryError';
  }
}

export class ConfigError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'ConfigError';
  }
}
