import { MalformedHeaderError, MalformedSolutionFileError } from '../core/errors';
import { StringTextReader } from '../system/textFileReader';
import { getFormatVersion, hasHeader, readSolutionHeader } from './solutionHeaderReader';

describe('solutionHeaderReader', () => {
  const header = 'Microsoft Visual Studio Solution File, Format Version';

  function reader(...lines: string[]): StringTextReader {
    return new StringTextReader(lines.join('\r\n'), 'Test.sln');
  }

  describe('readSolutionHeader', () => {
    it('should read the major version from the first line', () => {
      expect(readSolutionHeader(reader(`${header} 12.00`))).toBe(12);
    });

    it('should accept the header on the second line', () => {
      const input = reader('', `${header} 11.00`, '# Visual Studio 2010');

      expect(readSolutionHeader(input)).toBe(11);
      expect(input.lineNumber).toBe(2);
    });

    it('should ignore surrounding white space and a byte order mark', () => {
      expect(readSolutionHeader(reader(`\uFEFF${header} 10.00  `))).toBe(10);
    });

    it('should accept versions with up to four components', () => {
      expect(readSolutionHeader(reader(`${header} 9.0.1.2`))).toBe(9);
    });

    it('should reject a header that is not on the first two lines', () => {
      const input = reader('', '', `${header} 12.00`);

      expect(() => readSolutionHeader(input)).toThrow(MalformedSolutionFileError);
    });

    it('should reject empty input', () => {
      expect(() => readSolutionHeader(new StringTextReader(''))).toThrow(MalformedSolutionFileError);
    });

    it.each(['X.Y', '12', '12.', '1.2.3.4.5', ''])('should reject the version "%s"', version => {
      expect(() => readSolutionHeader(reader(`${header} ${version}`))).toThrow(MalformedHeaderError);
    });

    it('should report the source and line of a bad version', () => {
      let error: unknown;
      try {
        readSolutionHeader(reader('', `${header} X.Y`));
      } catch (e) {
        error = e;
      }

      expect(error).toBeInstanceOf(MalformedHeaderError);
      expect(error).toMatchObject({ filePath: 'Test.sln', line: 2 });
    });
  });

  describe('hasHeader', () => {
    it('should detect the header prefix only at the start of a line', () => {
      expect(hasHeader(`${header} 12.00`)).toBe(true);
      expect(hasHeader(`  ${header} 12.00`)).toBe(true);
      expect(hasHeader(`# ${header} 12.00`)).toBe(false);
    });
  });

  describe('getFormatVersion', () => {
    it('should return undefined for an unparsable version', () => {
      expect(getFormatVersion(`${header} twelve`)).toBeUndefined();
      expect(getFormatVersion(`${header} 8.00`)).toBe(8);
    });
  });
});
