import { ClassName } from '../models/class-name.js';
import { applyUrlPattern } from '../services/url-pattern.js';

describe('applyUrlPattern', () => {
  const className = ClassName.parse('com.example.Foo');

  test('should replace dots with the delimiter', () => {
    expect(applyUrlPattern('{baseUrl}{full -}', { baseUrl: 'http://x/', className })).toBe('http://x/com-example-Foo');
  });

  test('should insert the fully-qualified name as-is without a delimiter', () => {
    expect(applyUrlPattern('{baseUrl}{full}', { baseUrl: 'http://x/', className })).toBe('http://x/com.example.Foo');
  });

  test('should keep literal text around placeholders', () => {
    const url = applyUrlPattern('https://docs.example.com/api/{full /}.html?lang=en', { className });
    expect(url).toBe('https://docs.example.com/api/com/example/Foo.html?lang=en');
  });

  test('should replace unknown fields with an empty string', () => {
    expect(applyUrlPattern('{baseUrl}{version}/{full}', { baseUrl: 'http://x/', className })).toBe('http://x//com.example.Foo');
  });

  test('should use an empty base URL when none is defined', () => {
    expect(applyUrlPattern('{baseUrl}{full}', { className })).toBe('com.example.Foo');
  });

  test('should not interpret replacement characters in values', () => {
    expect(applyUrlPattern('{baseUrl}{full $}', { baseUrl: 'http://x/$1/', className })).toBe('http://x/$1/com$example$Foo');
  });

  test('should return a pattern without placeholders unchanged', () => {
    expect(applyUrlPattern('http://example.com/docs', { className })).toBe('http://example.com/docs');
  });
});
