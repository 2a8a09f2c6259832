import 'reflect-metadata';
import { ICsvAnalyzer } from '../services/csv-analyzer.interface';
import { columnsCommand } from './columns';

describe('columnsCommand', () => {
  let logSpy: jest.SpyInstance;

  beforeEach(() => {
    logSpy = jest.spyOn(console, 'log').mockImplementation(() => undefined);
  });

  afterEach(() => {
    jest.restoreAllMocks();
  });

  it('should print columns and missing columns per file', async () => {
    // Arrange
    const analyzer: jest.Mocked<ICsvAnalyzer> = {
      tables: [],
      loadFromDirectory: jest.fn(),
      loadFromFiles: jest.fn().mockResolvedValue({ loaded: 2, files: ['a.csv', 'b.csv'], errors: [] }),
      useTables: jest.fn(),
      groupedDataByColumn: jest.fn(),
      exportMatchedData: jest.fn(),
      exportUnmatchedData: jest.fn(),
      listFilenames: jest.fn(),
      listColumnsByFile: jest.fn().mockReturnValue(new Map([['a.csv', ['id', 'category']], ['b.csv', ['id']]])),
      listMissingColumnsByFile: jest.fn().mockReturnValue(new Map([['b.csv', ['category']]])),
      getColumnData: jest.fn(),
      searchRows: jest.fn()
    };

    // Act
    const exitCode = await columnsCommand(analyzer, ['a.csv', 'b.csv']);

    // Assert
    expect(exitCode).toBe(0);
    expect(logSpy.mock.calls.map((call) => call[0])).toEqual([
      'Loaded 2 of 2 CSV file(s)',
      'a.csv: id, category',
      'b.csv: id',
      '  missing: category'
    ]);
  });
});
