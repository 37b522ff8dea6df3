/**
 * Refanging of indicators pasted from advisories (evil[.]com, hxxp://).
 */

/**
 * Refang a defanged indicator.
 *   evil[.]com → evil.com
 *   hxxp://evil[.]com → http://evil.com
 *   user[at]evil.com → user@evil.com
 */
export function refang(ioc: string): string {
  let result = ioc;

  result = result.replace(/^hxxp/i, 'http');
  result = result.replace(/^fxp/i, 'ftp');

  result = result.replace(/\[\.\]/g, '.');
  result = result.replace(/\(\.\)/g, '.');
  result = result.replace(/\[dot\]/gi, '.');

  result = result.replace(/\[@\]/g, '@');
  result = result.replace(/\[at\]/gi, '@');

  result = result.replace(/\[:\/\/\]/g, '://');

  return result;
}
