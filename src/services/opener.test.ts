import { describe, it, expect, vi } from 'vitest';
import { LinkOpener, ProcessLauncher, getOpenCommand } from './opener.js';

describe('getOpenCommand', () => {
  it('should pick the platform opener', () => {
    expect(getOpenCommand('https://example.com', 'linux')).toEqual({ command: 'xdg-open', args: ['https://example.com'] });
    expect(getOpenCommand('https://example.com', 'darwin')).toEqual({ command: 'open', args: ['https://example.com'] });
    expect(getOpenCommand('https://example.com', 'win32')).toEqual({
      command: 'rundll32',
      args: ['url.dll,FileProtocolHandler', 'https://example.com']
    });
    expect(getOpenCommand('https://example.com', 'aix')).toBeNull();
  });
});

describe('LinkOpener', () => {
  const teamsTarget = {
    kind: 'teams' as const,
    url: 'https://teams.microsoft.com/l/meetup-join/abc',
    appUrl: 'msteams://teams.microsoft.com/l/meetup-join/abc'
  };

  it('should open Teams links in the app first', async () => {
    const launch = vi.fn<ProcessLauncher>().mockResolvedValue(0);
    const opener = new LinkOpener(launch, 'linux');

    await expect(opener.open(teamsTarget)).resolves.toBe(true);
    expect(launch).toHaveBeenCalledTimes(1);
    expect(launch).toHaveBeenCalledWith('xdg-open', ['msteams://teams.microsoft.com/l/meetup-join/abc']);
  });

  it('should fall back to the browser when the app cannot be opened', async () => {
    const launch = vi.fn<ProcessLauncher>().mockResolvedValueOnce(4).mockResolvedValueOnce(0);
    const opener = new LinkOpener(launch, 'linux');

    await expect(opener.open(teamsTarget)).resolves.toBe(true);
    expect(launch).toHaveBeenLastCalledWith('xdg-open', ['https://teams.microsoft.com/l/meetup-join/abc']);
  });

  it('should open web links directly', async () => {
    const launch = vi.fn<ProcessLauncher>().mockResolvedValue(0);
    const opener = new LinkOpener(launch, 'darwin');

    await expect(opener.open({ kind: 'web', url: 'https://outlook.office365.com/owa/?itemid=1' })).resolves.toBe(true);
    expect(launch).toHaveBeenCalledWith('open', ['https://outlook.office365.com/owa/?itemid=1']);
  });

  it('should report launch errors without throwing', async () => {
    const launch = vi.fn<ProcessLauncher>().mockRejectedValue(new Error('spawn xdg-open ENOENT'));
    const opener = new LinkOpener(launch, 'linux');

    await expect(opener.openUrl('https://example.com')).resolves.toBe(false);
    expect(console.error).toHaveBeenCalledWith('Failed to open https://example.com: spawn xdg-open ENOENT');
  });

  it('should refuse unsupported platforms', async () => {
    const launch = vi.fn<ProcessLauncher>();
    const opener = new LinkOpener(launch, 'aix');

    await expect(opener.openUrl('https://example.com')).resolves.toBe(false);
    expect(launch).not.toHaveBeenCalled();
  });
});
