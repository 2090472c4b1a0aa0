/**
 * Executable stand-in for ffmpeg, for tests that exercise real child
 * processes. The last argument picks the behaviour; every run first echoes
 * its arguments to stderr.
 */

import { chmod, writeFile } from 'node:fs/promises';
import { join } from 'node:path';

const SCRIPT = `
const args = process.argv.slice(2);
process.stderr.write('args:' + args.join(' ') + '\\n');

switch (args[args.length - 1]) {
  case 'transcode':
    process.stderr.write('frame=   24 fps=0.0 q=30.0 size=       0kB time=00:00:01.00 bitrate=N/A\\r');
    process.stderr.write('frame=   48 fps= 48 q=30.0 size=     256kB time=00:00:02.00 bitrate=1048.6kbits/s\\n');
    process.stdout.write('out_time_us=1000000\\ntotal_size=1024\\nprogress=continue\\n');
    process.stdout.write('out_time_us=2000000\\ntotal_size=262144\\nprogress=end\\n');
    break;
  case 'broken':
    process.stderr.write('Error opening output file\\n');
    process.exitCode = 1;
    break;
  case 'header':
    process.stderr.write('  Duration: 00:02:00.00, start: 0.000000, bitrate: 1205 kb/s\\n');
    process.stderr.write('At least one output file must be specified\\n');
    process.exitCode = 1;
    break;
  case 'hang':
    setInterval(() => {}, 1000);
    break;
}
`;

/**
 * Write the stand-in into `dir` and return its path
 */
export async function writeStandInFfmpeg(dir: string): Promise<string> {
  const scriptPath = join(dir, 'ffmpeg');
  await writeFile(scriptPath, `#!${process.execPath}\n${SCRIPT}`);
  await chmod(scriptPath, 0o755);
  return scriptPath;
}
