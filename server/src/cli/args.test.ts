import { describe, it, expect } from 'vitest';
import { parseCli } from './args.js';

describe('parseCli', () => {
  it('defaults to record mode', () => {
    expect(parseCli([])).toEqual({
      command: 'record',
      camera: undefined,
      ips: [],
      noCamera: false,
      samples: undefined,
      name: undefined,
      timeoutMs: undefined,
      help: false
    });
  });

  it('collects repeated --ip flags and the camera index', () => {
    const options = parseCli(['record', '--ip', '10.0.0.2', '--ip', '10.0.0.3', '--camera', '1']);

    expect(options.ips).toEqual(['10.0.0.2', '10.0.0.3']);
    expect(options.camera).toBe(1);
  });

  it('reads --no-camera', () => {
    expect(parseCli(['--no-camera']).noCamera).toBe(true);
  });

  it('parses calibrate options', () => {
    const options = parseCli(['calibrate', '--samples', 'red.json', '--name', 'red']);

    expect(options.command).toBe('calibrate');
    expect(options.samples).toBe('red.json');
    expect(options.name).toBe('red');
  });

  it('requires a sample file for calibrate', () => {
    expect(() => parseCli(['calibrate'])).toThrow('calibrate needs --samples <file>');
  });

  it('rejects unknown commands and flags', () => {
    expect(() => parseCli(['replay'])).toThrow();
    expect(() => parseCli(['--fps', '30'])).toThrow();
  });

  it('rejects a negative camera index', () => {
    expect(() => parseCli(['--camera', '-1'])).toThrow();
  });
});
