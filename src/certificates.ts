import { access, appendFile, lstat, mkdir, readFile, rm, symlink } from 'fs/promises';
import { constants } from 'fs';
import { join } from 'path';
import { PROJECT_CERT_DIR } from './config.js';
import { errorCode } from './errors.js';

export interface CertificatePair {
  cert: string;
  key: string;
}

export interface LinkedCertificates extends CertificatePair {
  certLink: string;
  keyLink: string;
}

export async function findCertificates(certificateDir: string, domain: string): Promise<CertificatePair> {
  const pair = {
    cert: join(certificateDir, `${domain}.crt`),
    key: join(certificateDir, `${domain}.key`),
  };

  for (const [label, file] of [
    ['Certificate', pair.cert],
    ['Key', pair.key],
  ] as const) {
    try {
      await access(file, constants.F_OK);
    } catch {
      throw new Error(`${label} file not found: ${file}`);
    }
  }

  return pair;
}

async function replaceSymlink(target: string, link: string): Promise<void> {
  try {
    if ((await lstat(link)).isSymbolicLink()) {
      await rm(link);
    }
  } catch (error) {
    if (errorCode(error) !== 'ENOENT') throw error;
  }
  await symlink(target, link);
}

/** Links the tool's certificate as `certificates/cert.crt` and `certificates/cert.key`. */
export async function linkCertificates(projectPath: string, pair: CertificatePair): Promise<LinkedCertificates> {
  const dir = join(projectPath, PROJECT_CERT_DIR);
  await mkdir(dir, { recursive: true });

  const certLink = join(dir, 'cert.crt');
  const keyLink = join(dir, 'cert.key');
  await replaceSymlink(pair.cert, certLink);
  await replaceSymlink(pair.key, keyLink);

  return { ...pair, certLink, keyLink };
}

/** Appends `/certificates` to .gitignore; returns false when it was already there. */
export async function ignoreCertificates(projectPath: string): Promise<boolean> {
  const gitignore = join(projectPath, '.gitignore');
  let content = '';
  try {
    content = await readFile(gitignore, 'utf-8');
  } catch (error) {
    if (errorCode(error) !== 'ENOENT') throw error;
  }

  if (content.split(/\r?\n/).some((line) => line.startsWith(`/${PROJECT_CERT_DIR}`))) {
    return false;
  }

  const separator = content === '' || content.endsWith('\n') ? '' : '\n';
  await appendFile(gitignore, `${separator}/${PROJECT_CERT_DIR}\n`);
  return true;
}
