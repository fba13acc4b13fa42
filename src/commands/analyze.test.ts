/**
 * Tests for analyze command
 */

import * as fs from 'fs';
import * as os from 'os';
import * as path from 'path';
import { analyzeCommand, checkPaths, AnalyzeCommandOptions } from './analyze';
import { logger } from '../logger';

jest.mock('../logger', () => ({
  logger: {
    trace: jest.fn(),
    debug: jest.fn(),
    info: jest.fn(),
    warn: jest.fn(),
    error: jest.fn(),
    success: jest.fn(),
  },
}));

const mockedLogger = logger as jest.Mocked<typeof logger>;

const LOG_CONTENT = [
  '10.0.0.1 - - [10/Oct/2000:13:55:36 -0700] "GET /a HTTP/1.1" 200 1024 "curl/7.81.0"',
  '10.0.0.1 - - [10/Oct/2000:13:55:37 -0700] "GET /b HTTP/1.1" 200 3072 "Mozilla/5.0 (X11; Linux x86_64)"',
  '10.0.0.2 - - [10/Oct/2000:13:55:38 -0700] "GET /c HTTP/1.1" 2x0 10 "curl/7.81.0"',
  '',
].join('\n');

const EXPECTED_JSON = [
  '{',
  '    "total_number_of_lines_processed": 3,',
  '    "total_number_of_lines_ok": 2,',
  '    "total_number_of_lines_failed": 1,',
  '    "top_client_ips": {',
  '        "10.0.0.1": 2',
  '    },',
  '    "top_path_avg_response_size": {',
  '        "/b": 3,',
  '        "/a": 1',
  '    }',
  '}',
].join('\n');

describe('analyze command', () => {
  let tmpDir: string;
  let inputPath: string;
  let mockExit: jest.SpyInstance;
  let mockConsoleLog: jest.SpyInstance;

  beforeEach(() => {
    jest.clearAllMocks();
    tmpDir = fs.mkdtempSync(path.join(os.tmpdir(), 'clfstats-test-'));
    inputPath = path.join(tmpDir, 'access.log');
    fs.writeFileSync(inputPath, LOG_CONTENT);
    mockExit = jest.spyOn(process, 'exit').mockImplementation(() => {
      throw new Error('process.exit called');
    });
    mockConsoleLog = jest.spyOn(console, 'log').mockImplementation();
  });

  afterEach(() => {
    mockExit.mockRestore();
    mockConsoleLog.mockRestore();
    fs.rmSync(tmpDir, { recursive: true, force: true });
  });

  function options(overrides: Partial<AnalyzeCommandOptions> = {}): AnalyzeCommandOptions {
    return {
      input: inputPath,
      format: 'json',
      maxClientIps: 10,
      maxPaths: 10,
      ...overrides,
    };
  }

  it('should write the JSON report to the output file', async () => {
    const outputPath = path.join(tmpDir, 'report.json');

    await analyzeCommand(options({ output: outputPath }));

    expect(fs.readFileSync(outputPath, 'utf-8')).toBe(EXPECTED_JSON + '\n');
    expect(mockConsoleLog).not.toHaveBeenCalled();
    expect(mockedLogger.success).toHaveBeenCalledWith(`Report written to ${outputPath}`);
  });

  it('should print the report to stdout when no output file is given', async () => {
    await analyzeCommand(options());

    expect(mockConsoleLog).toHaveBeenCalledWith(EXPECTED_JSON);
  });

  it('should render the requested format', async () => {
    await analyzeCommand(options({ format: 'markdown' }));

    expect(mockConsoleLog).toHaveBeenCalledTimes(1);
    expect(mockConsoleLog.mock.calls[0][0]).toContain('| 10.0.0.1 | 2 |');
  });

  it('should apply the limits', async () => {
    const outputPath = path.join(tmpDir, 'report.json');

    await analyzeCommand(options({ output: outputPath, maxClientIps: 0, maxPaths: 1 }));

    const report = JSON.parse(fs.readFileSync(outputPath, 'utf-8'));
    expect(report.top_client_ips).toEqual({});
    expect(report.top_path_avg_response_size).toEqual({ '/b': 3 });
  });

  it('should warn before overwriting an existing output file', async () => {
    const outputPath = path.join(tmpDir, 'report.json');
    fs.writeFileSync(outputPath, 'old');

    await analyzeCommand(options({ output: outputPath }));

    expect(mockedLogger.warn).toHaveBeenCalledWith(
      `Output file already exists and will be overwritten: ${outputPath}`
    );
    expect(fs.readFileSync(outputPath, 'utf-8')).toBe(EXPECTED_JSON + '\n');
  });

  it('should exit with error if the input file is missing', async () => {
    const missing = path.join(tmpDir, 'missing.log');

    await expect(analyzeCommand(options({ input: missing }))).rejects.toThrow('process.exit called');
    expect(mockExit).toHaveBeenCalledWith(1);
    expect(mockedLogger.error).toHaveBeenCalledWith(`Cannot find input file: ${missing}`);
  });

  it('should exit with error if the output directory does not exist', async () => {
    const outputPath = path.join(tmpDir, 'no-such-dir', 'report.json');

    await expect(analyzeCommand(options({ output: outputPath }))).rejects.toThrow('process.exit called');
    expect(mockedLogger.error).toHaveBeenCalledWith(`Output file cannot be opened for writing: ${outputPath}`);
  });

  it('should exit with error if the report cannot be written', async () => {
    const outputPath = path.join(tmpDir, 'is-a-directory');
    fs.mkdirSync(outputPath);

    await expect(analyzeCommand(options({ output: outputPath }))).rejects.toThrow('process.exit called');
    expect(mockExit).toHaveBeenCalledWith(1);
    expect(mockedLogger.error).toHaveBeenCalledWith(expect.stringContaining('Failed to write report:'));
  });

  describe('checkPaths', () => {
    it('should return null when input and output are usable', () => {
      expect(checkPaths(inputPath, path.join(tmpDir, 'out.json'))).toBeNull();
      expect(checkPaths(inputPath, undefined)).toBeNull();
    });

    it('should describe a missing input file', () => {
      expect(checkPaths('/definitely/not/here.log', undefined)).toBe(
        'Cannot find input file: /definitely/not/here.log'
      );
    });
  });
});
