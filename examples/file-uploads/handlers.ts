import { Context, FileRecord } from '../../src'

// uploads are kept in memory, keyed by the uploading session
const uploads = new Map<string, FileRecord[]>()

function index () {
  return `<html>
  <head><title>File Upload</title></head>
  <body>
    <h2>Upload a File</h2>
    <form action="/upload" method="post" enctype="multipart/form-data">
      <input type="file" name="file"><br><br>
      <input type="submit" value="Upload">
    </form>
  </body>
</html>`
}

function upload (this: Context, file: FileRecord | string | null): [number, string] {
  if (!file || typeof file === 'string') {
    return [400, 'No file uploaded.']
  }

  const stored = uploads.get(this.session.id) || []
  stored.push(file)
  uploads.set(this.session.id, stored)
  return [200, `File '${file.filename}' uploaded successfully (${file.data.length} bytes).`]
}
upload.params = [{ name: 'file', default: null }]

export const handlers = { index, upload }
export { uploads }
