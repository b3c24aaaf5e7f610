import { HeaderList } from '../../src'

function index (): [number, string, HeaderList] {
  return [200, 'hello world', [
    ['Content-Type', 'text/html'],
    ['X-Content-Type-Options', 'nosniff'],
    ['X-Frame-Options', 'DENY'],
    ['X-XSS-Protection', '1; mode=block'],
    ['Strict-Transport-Security', 'max-age=31536000; includeSubDomains'],
    ['Content-Security-Policy', "default-src 'self'"],
  ]]
}

export const handlers = { index }
