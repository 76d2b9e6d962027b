import { describe, it, expect, vi } from 'vitest';
import { CommanderError, type Command } from 'commander';
import { createProgram, parseRemoteOption, parseSeconds } from './program.ts';

function quietProgram() {
  const handlers = {
    synchronize: vi.fn().mockResolvedValue(undefined),
    detect: vi.fn().mockResolvedValue(undefined),
  };
  const program = createProgram(handlers);
  const quiet = (command: Command) => {
    command.exitOverride();
    command.configureOutput({ writeOut: () => {}, writeErr: () => {} });
  };
  quiet(program);
  program.commands.forEach(quiet);
  return { program, handlers };
}

async function commanderErrorCode(promise: Promise<unknown>): Promise<string | undefined> {
  try {
    await promise;
  } catch (err) {
    if (err instanceof CommanderError) {
      return err.code;
    }
    throw err;
  }
  return undefined;
}

const globals = ['--host', 'https://api.github.test', '--github-project', 'octo-org/widgets'];

describe('createProgram', () => {
  it('should hand synchronize its options merged with the globals', async () => {
    const { program, handlers } = quietProgram();

    await program.parseAsync([...globals, 'synchronize', '--remote', '/srv/mirror.git', '--window', '60'], {
      from: 'user',
    });

    expect(handlers.synchronize).toHaveBeenCalledWith({
      host: 'https://api.github.test',
      githubProject: 'octo-org/widgets',
      remote: '/srv/mirror.git',
      window: 60,
    });
    expect(handlers.detect).not.toHaveBeenCalled();
  });

  it('should hand detect its options merged with the globals', async () => {
    const { program, handlers } = quietProgram();

    await program.parseAsync([...globals, 'detect', '--target', 'https://preview.test', '--timeout', '120'], {
      from: 'user',
    });

    expect(handlers.detect).toHaveBeenCalledWith({
      host: 'https://api.github.test',
      githubProject: 'octo-org/widgets',
      target: 'https://preview.test',
      timeout: 120,
    });
  });

  it('should reject a host that is not an http URL', async () => {
    const { program, handlers } = quietProgram();

    const code = await commanderErrorCode(
      program.parseAsync(
        ['--host', 'ftp://api.github.test', '--github-project', 'octo-org/widgets', 'detect'],
        { from: 'user' }
      )
    );

    expect(code).toBe('commander.invalidArgument');
    expect(handlers.detect).not.toHaveBeenCalled();
  });

  it('should reject a zero window', async () => {
    const { program, handlers } = quietProgram();

    const code = await commanderErrorCode(
      program.parseAsync([...globals, 'synchronize', '--remote', '/srv/mirror.git', '--window', '0'], {
        from: 'user',
      })
    );

    expect(code).toBe('commander.invalidArgument');
    expect(handlers.synchronize).not.toHaveBeenCalled();
  });

  it('should reject a relative remote before running anything', async () => {
    const { program, handlers } = quietProgram();

    const code = await commanderErrorCode(
      program.parseAsync([...globals, 'synchronize', '--remote', 'relative/remote.git', '--window', '60'], {
        from: 'user',
      })
    );

    expect(code).toBe('commander.invalidArgument');
    expect(handlers.synchronize).not.toHaveBeenCalled();
  });

  it('should require the subcommand options', async () => {
    const { program, handlers } = quietProgram();

    const code = await commanderErrorCode(
      program.parseAsync([...globals, 'detect', '--target', 'https://preview.test'], { from: 'user' })
    );

    expect(code).toBe('commander.missingMandatoryOptionValue');
    expect(handlers.detect).not.toHaveBeenCalled();
  });
});

describe('parseSeconds', () => {
  it('should parse whole seconds', () => {
    expect(parseSeconds('300')).toBe(300);
  });

  it('should reject fractions', () => {
    expect(() => parseSeconds('1.5')).toThrow('Invalid number: 1.5');
  });
});

describe('parseRemoteOption', () => {
  it('should keep URLs and absolute paths as given', () => {
    expect(parseRemoteOption('https://github.test/octo-org/widgets.git')).toBe(
      'https://github.test/octo-org/widgets.git'
    );
    expect(parseRemoteOption('/srv/mirror.git')).toBe('/srv/mirror.git');
  });

  it('should reject relative paths', () => {
    expect(() => parseRemoteOption('relative/remote.git')).toThrow(
      'Remote must be a URL or an absolute path: relative/remote.git'
    );
  });
});
