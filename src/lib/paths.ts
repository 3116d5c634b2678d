import path from 'node:path';

const RCOMP_DIR = '.rcomp';

export function rcompDir(projectRoot: string): string {
  return path.join(projectRoot, RCOMP_DIR);
}

export function configPath(projectRoot: string): string {
  return path.join(rcompDir(projectRoot), 'config.yaml');
}

export function resolveFromRoot(projectRoot: string, target: string): string {
  return path.resolve(projectRoot, target);
}

export function sessionsDir(projectRoot: string, dir: string): string {
  return resolveFromRoot(projectRoot, dir);
}

export function sessionPath(projectRoot: string, dir: string, id: string): string {
  return path.join(sessionsDir(projectRoot, dir), `${id}.json`);
}

export function contentPath(contentDir: string, moduleId: string, extension: string): string {
  return path.join(contentDir, `${moduleId}${extension}`);
}
