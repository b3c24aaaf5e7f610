import { HeaderList } from '../core/handler'

function redirect (location: string): [number, string, HeaderList] {
  return [
    302,
    `<html><head><meta http-equiv='refresh' content='0;url=${location}'></head></html>`,
    [['Location', location]],
  ]
}

export { redirect }
