import 'reflect-metadata';
import { ICsvAnalyzer } from '../services/csv-analyzer.interface';
import { GroupingResult } from '../types/domain.types';
import { EmptyResultError, ExportError, PathError } from '../types/error.types';
import { fail, succeed } from '../types/result.types';
import { groupCommand, GroupCommandOptions } from './group';

describe('groupCommand', () => {
  let analyzer: jest.Mocked<ICsvAnalyzer>;
  const grouping: GroupingResult = {
    column: 'category',
    matched: new Map(),
    matchedColumns: [],
    unmatched: new Map()
  };
  const options: GroupCommandOptions = { by: 'category', out: 'out', prefix: 'grouped' };

  beforeEach(() => {
    jest.spyOn(console, 'log').mockImplementation(() => undefined);
    jest.spyOn(console, 'error').mockImplementation(() => undefined);

    analyzer = {
      tables: [],
      loadFromDirectory: jest.fn(),
      loadFromFiles: jest.fn(),
      useTables: jest.fn(),
      groupedDataByColumn: jest.fn(),
      exportMatchedData: jest.fn(),
      exportUnmatchedData: jest.fn(),
      listFilenames: jest.fn(),
      listColumnsByFile: jest.fn(),
      listMissingColumnsByFile: jest.fn(),
      getColumnData: jest.fn(),
      searchRows: jest.fn()
    };

    analyzer.loadFromDirectory.mockResolvedValue(succeed({ loaded: 2, files: ['a.csv', 'b.csv'], errors: [] }, 'Loaded 2'));
    analyzer.loadFromFiles.mockResolvedValue({ loaded: 2, files: ['a.csv', 'b.csv'], errors: [] });
    analyzer.groupedDataByColumn.mockReturnValue(succeed(grouping, 'Grouped'));
    analyzer.exportMatchedData.mockResolvedValue(succeed({ outputPath: 'out/grouped.csv', rows: 2 }, 'Exported'));
    analyzer.exportUnmatchedData.mockResolvedValue({ written: [], errors: [] });
  });

  afterEach(() => {
    jest.restoreAllMocks();
  });

  // Test: A lone non-CSV argument is treated as a directory
  it('should load a directory and export both buckets', async () => {
    // Act
    const exitCode = await groupCommand(analyzer, ['data'], options);

    // Assert
    expect(exitCode).toBe(0);
    expect(analyzer.loadFromDirectory).toHaveBeenCalledWith('data');
    expect(analyzer.groupedDataByColumn).toHaveBeenCalledWith('category');
    expect(analyzer.exportMatchedData).toHaveBeenCalledWith('out', grouping, 'grouped');
    expect(analyzer.exportUnmatchedData).toHaveBeenCalledWith('out', grouping, undefined);
  });

  it('should load a list of files', async () => {
    // Act
    await groupCommand(analyzer, ['a.csv', 'b.csv'], options);

    // Assert
    expect(analyzer.loadFromFiles).toHaveBeenCalledWith(['a.csv', 'b.csv']);
    expect(analyzer.loadFromDirectory).not.toHaveBeenCalled();
  });

  it('should stop with exit code 1 when the directory is unusable', async () => {
    // Arrange
    analyzer.loadFromDirectory.mockResolvedValue(fail(new PathError('data', 'Directory not found: data')));

    // Act
    const exitCode = await groupCommand(analyzer, ['data'], options);

    // Assert
    expect(exitCode).toBe(1);
    expect(analyzer.groupedDataByColumn).not.toHaveBeenCalled();
  });

  // Test: Nothing to export is reported but is not a failure
  it('should exit 0 when nothing matched', async () => {
    // Arrange
    analyzer.exportMatchedData.mockResolvedValue(fail(new EmptyResultError('No matched data to export')));

    // Act & Assert
    await expect(groupCommand(analyzer, ['data'], options)).resolves.toBe(0);
  });

  it('should exit 1 when the combined file cannot be written', async () => {
    // Arrange
    analyzer.exportMatchedData.mockResolvedValue(fail(new ExportError('out/grouped.csv', 'EACCES')));

    // Act & Assert
    await expect(groupCommand(analyzer, ['data'], options)).resolves.toBe(1);
  });

  it('should exit 1 when an unmatched file fails', async () => {
    // Arrange
    analyzer.exportUnmatchedData.mockResolvedValue({
      written: [],
      errors: [new ExportError('out/b.csv', 'ENOSPC')]
    });

    // Act & Assert
    await expect(groupCommand(analyzer, ['data'], options)).resolves.toBe(1);
  });

  it('should skip the unmatched export on request', async () => {
    // Act
    await groupCommand(analyzer, ['data'], { ...options, skipUnmatched: true, unmatchedPrefix: 'rest' });

    // Assert
    expect(analyzer.exportUnmatchedData).not.toHaveBeenCalled();
  });
});
