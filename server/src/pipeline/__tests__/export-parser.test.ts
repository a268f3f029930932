import { describe, it, expect } from 'vitest';
import { cleanLine, parseExport, parseExportText, parseHeader } from '../export-parser';

describe('parseHeader', () => {
  it('should parse a bracketed 24h header with seconds', () => {
    expect(parseHeader('[15/01/24, 21:45:12] Priya: hello')).toEqual({
      date: '15/01/24',
      time: '21:45:12',
      sender: 'Priya',
      text: 'hello',
    });
  });

  it('should parse a dash-separated 12h header', () => {
    expect(parseHeader('1/15/24, 9:45 PM - Rahul: kuch nhi')).toEqual({
      date: '1/15/24',
      time: '9:45 PM',
      sender: 'Rahul',
      text: 'kuch nhi',
    });
  });

  it('should accept dotted dates and four-digit years', () => {
    const header = parseHeader('15.01.2024, 21:45 - Priya: hi');
    expect(header?.date).toBe('15.01.2024');
    expect(header?.time).toBe('21:45');
  });

  it('should split sender at the first colon-space', () => {
    expect(parseHeader('[15/01/24, 21:45:12] Priya: meet at 10:30: ok?')?.text).toBe(
      'meet at 10:30: ok?'
    );
  });

  it('should return null for continuation lines', () => {
    expect(parseHeader('just some more text')).toBeNull();
  });
});

describe('cleanLine', () => {
  it('should strip direction marks and whitespace', () => {
    expect(cleanLine('\u200E  hello\u200F ')).toBe('hello');
  });
});

describe('parseExport', () => {
  it('should append continuation lines with a newline', () => {
    const messages = parseExport(
      ['[15/01/24, 21:45:12] Priya: line one', 'line two', '', 'line three'],
      'Rahul'
    );
    expect(messages).toHaveLength(1);
    expect(messages[0].text).toBe('line one\nline two\nline three');
  });

  it('should drop continuation lines before the first header', () => {
    const messages = parseExport(
      ['orphan line', '[15/01/24, 21:45:12] Priya: hello'],
      'Rahul'
    );
    expect(messages).toEqual([
      { sender: 'Priya', text: 'hello', date: '15/01/24', time: '21:45:12', isOwner: false },
    ]);
  });

  it('should remove the edited marker', () => {
    const [message] = parseExport(
      ['[15/01/24, 21:45:12] Rahul: theek hai <This message was edited>'],
      'Rahul'
    );
    expect(message.text).toBe('theek hai');
  });

  it('should strip direction marks before matching', () => {
    const [message] = parseExport(['\u200E[15/01/24, 21:45:12] Priya: \u200Ehello'], 'Rahul');
    expect(message.sender).toBe('Priya');
    expect(message.text).toBe('hello');
  });

  it('should compare the owner name exactly', () => {
    const messages = parseExport(
      ['[15/01/24, 21:45:12] Rahul: a', '[15/01/24, 21:45:13] rahul: b'],
      'Rahul'
    );
    expect(messages.map((m) => m.isOwner)).toEqual([true, false]);
  });

  it('should treat a header-like line inside a message as a new message', () => {
    const messages = parseExport(
      ['[15/01/24, 21:45:12] Priya: look at this', '[01/01/20, 10:00:00] Someone: quoted'],
      'Rahul'
    );
    expect(messages.map((m) => m.sender)).toEqual(['Priya', 'Someone']);
  });

  it('should return an empty list for input without headers', () => {
    expect(parseExport(['', 'no headers here'], 'Rahul')).toEqual([]);
  });
});

describe('parseExportText', () => {
  it('should split on CRLF and LF', () => {
    const messages = parseExportText(
      '[15/01/24, 21:45:12] Priya: hi\r\n[15/01/24, 21:45:20] Rahul: hello\n',
      'Rahul'
    );
    expect(messages.map((m) => m.text)).toEqual(['hi', 'hello']);
  });
});
