import { cleanText, extractHtmlContent } from './content.js';

describe('cleanText', () => {
  it('should collapse spaces and keep paragraph breaks', () => {
    expect(cleanText('  a   b\r\n\r\n\r\n\r\nc\t\td  ')).toBe('a b\n\nc d');
  });
});

describe('extractHtmlContent', () => {
  it('should extract paragraph text and the page title', () => {
    const result = extractHtmlContent(
      '<html><head><title>Sky</title></head><body><p>The sky is blue.</p></body></html>'
    );
    expect(result).toEqual({ title: 'Sky', text: 'The sky is blue.' });
  });

  it('should drop scripts and styles', () => {
    const result = extractHtmlContent(
      '<html><head><style>p { color: red }</style></head><body><p>Hello</p><script>var x = 1;</script></body></html>'
    );
    expect(result.text).toBe('Hello');
  });

  it('should render list items as bullets', () => {
    const result = extractHtmlContent('<html><body><ul><li>One</li><li>Two</li></ul></body></html>');
    expect(result.text).toBe('- One\n\n- Two');
  });

  it('should return empty text for an empty page', () => {
    expect(extractHtmlContent('<html><body></body></html>')).toEqual({ title: undefined, text: '' });
  });
});
