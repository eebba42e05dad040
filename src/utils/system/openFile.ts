import { spawn } from 'child_process';

export type OpenCommand = {
  command: string;
  args: string[];
};

/**
 * The command that hands a file to the desktop's default application
 */
export function openCommand(filePath: string, platform: NodeJS.Platform = process.platform): OpenCommand {
  switch (platform) {
    case 'darwin':
      return { command: 'open', args: [filePath] };
    case 'win32':
      // The empty string is the window title `start` expects before the path
      return { command: 'cmd', args: ['/c', 'start', '', filePath] };
    default:
      return { command: 'xdg-open', args: [filePath] };
  }
}

/**
 * Opens a file with the default application and returns once the handler has
 * started. The handler is not waited on.
 */
export function openWithDefaultApp(filePath: string, platform: NodeJS.Platform = process.platform): Promise<void> {
  const { command, args } = openCommand(filePath, platform);
  return new Promise((resolve, reject) => {
    const child = spawn(command, args, { detached: true, stdio: 'ignore' });
    child.on('spawn', () => {
      child.unref();
      resolve();
    });
    child.on('error', (error) => {
      reject(error);
    });
  });
}
