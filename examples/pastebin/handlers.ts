import path from 'path'
import * as uuid from 'uuid'

import { Context, HeaderList, configureTemplates, redirect, render } from '../../src'

configureTemplates(path.join(__dirname, 'templates'))

const pastes = new Map<string, string>()

async function index (this: Context) {
  if (this.method === 'POST') {
    const [content = ''] = this.body.get('paste_content') || []
    const id = uuid.v4()
    pastes.set(id, content)
    return redirect(`/paste/${id}`)
  }
  return render('index.html')
}

async function paste (
  this: Context,
  pasteId: string,
  action: string | null,
): Promise<string | [number, string] | [number, string, HeaderList]> {
  if (action === 'delete') {
    pastes.delete(pasteId)
    return redirect('/')
  }

  const content = pastes.get(pasteId)
  if (content === undefined) {
    return [404, '404 Not Found']
  }
  return render('paste.html', { paste_id: pasteId, paste_content: content })
}
paste.params = ['paste_id', { name: 'delete', default: null }]

export const handlers = { index, paste }
export { pastes }
