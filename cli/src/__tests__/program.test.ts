import fs from 'fs-extra';
import os from 'os';
import path from 'path';
import { PNG } from 'pngjs';
import { createProgram } from '../program';

function makePng(width: number, height: number, rgba: number[]): Buffer {
  const png = new PNG({ width, height });
  png.data.set(rgba);
  return PNG.sync.write(png);
}

describe('createProgram', () => {
  let workDir: string;
  let input: string;
  let logSpy: jest.SpyInstance;

  beforeEach(async () => {
    workDir = await fs.mkdtemp(path.join(os.tmpdir(), 'pixarray-program-'));
    input = path.join(workDir, 'badge.png');
    await fs.writeFile(input, makePng(1, 1, [255, 0, 0, 255]));

    jest.spyOn(process, 'exit').mockImplementation((code) => {
      throw new Error(`process.exit(${code})`);
    });
    logSpy = jest.spyOn(console, 'log').mockImplementation(() => undefined);
    jest.spyOn(console, 'error').mockImplementation(() => undefined);
  });

  afterEach(async () => {
    jest.restoreAllMocks();
    await fs.remove(workDir);
  });

  it('should convert a bare input path as bgr565', async () => {
    await createProgram().parseAsync(['node', 'pixarray', input]);

    const header = await fs.readFile(path.join(workDir, 'badge.h'), 'utf-8');
    expect(header).toContain('#define BADGE_IMG_FORMAT' + ' '.repeat(12) + '(VG_LITE_BGR565)\n');
    // Red lands in the low five bits of a BGR565 word: 0x001F
    expect(header).toContain('{\n    0x1F, 0x00\n};\n');
  });

  it('should honour --format and --output', async () => {
    const output = path.join(workDir, 'include', 'badge_rgb.h');

    await createProgram().parseAsync(['node', 'pixarray', 'convert', input, '-f', 'rgb888', '-o', output]);

    const header = await fs.readFile(output, 'utf-8');
    expect(header).toContain('{\n    0xFF, 0x00, 0x00\n};\n');
    expect(await fs.pathExists(path.join(workDir, 'badge.h'))).toBe(false);
  });

  it('should exit with status 1 for an unsupported format', async () => {
    await expect(createProgram().parseAsync(['node', 'pixarray', input, '--format', 'rgb555'])).rejects.toThrow(
      'process.exit(1)'
    );
    expect(await fs.pathExists(path.join(workDir, 'badge.h'))).toBe(false);
  });

  it('should list the formats after the convert help', async () => {
    const program = createProgram();
    const convert = program.commands.find((command) => command.name() === 'convert');
    let help = '';
    convert?.exitOverride().configureOutput({ writeOut: (text) => { help += text; } });

    await expect(program.parseAsync(['node', 'pixarray', 'convert', '--help'])).rejects.toHaveProperty(
      'code',
      'commander.helpDisplayed'
    );
    expect(convert).toBeDefined();
    expect(help).toContain('(default: "bgr565")');
    expect(help).toContain('Available formats:\n  rgb565: RGB565 (16-bit, 5-6-5)\n  bgr565: BGR565 (16-bit, 5-6-5)\n');
  });

  it('should print the package version', async () => {
    const program = createProgram();
    let printed = '';
    program.exitOverride().configureOutput({ writeOut: (text) => { printed += text; } });

    await expect(program.parseAsync(['node', 'pixarray', '--version'])).rejects.toHaveProperty(
      'code',
      'commander.version'
    );
    expect(printed).toBe('1.0.0\n');
  });

  it('should describe every format in the formats command', async () => {
    await createProgram().parseAsync(['node', 'pixarray', 'formats']);

    const printed = logSpy.mock.calls.map((args) => args.join(' ')).join('\n');
    expect(printed).toContain('RGB565 (16-bit, 5-6-5)');
    expect(printed).toContain('3 bytes per pixel, VG_LITE_BGR888');
  });
});
