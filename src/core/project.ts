import { execa } from 'execa';

/**
 * The git top-level of `cwd`, or `cwd` itself outside a git repository. Review
 * modules often live in plain directories, so git is not required.
 */
export async function getProjectRoot(cwd: string = process.cwd()): Promise<string> {
  try {
    const result = await execa('git', ['rev-parse', '--show-toplevel'], { cwd });
    const root = result.stdout.trim();
    return root || cwd;
  } catch {
    return cwd;
  }
}
