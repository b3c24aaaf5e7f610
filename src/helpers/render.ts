import nunjucks from 'nunjucks'

import { TemplateUnavailableError } from '../data/errors'

let environment: nunjucks.Environment | undefined

/**
 * Points `render()` at one or more template directories. Until this is
 * called, `render()` rejects with {@link TemplateUnavailableError}.
 */
function configureTemplates (paths: string | string[] = 'templates', opts: nunjucks.ConfigureOptions = {}) {
  environment = new nunjucks.Environment(
    new nunjucks.FileSystemLoader(paths, { noCache: Boolean(opts.watch) }),
    { autoescape: true, ...opts }
  )
  return environment
}

function resetTemplates () {
  environment = undefined
}

async function render (name: string, variables: Record<string, unknown> = {}): Promise<string> {
  const env = environment
  if (!env) {
    throw new TemplateUnavailableError(name)
  }

  return new Promise<string>((resolve, reject) => {
    env.render(name, variables, (err, result) => {
      if (err) {
        reject(err)
      } else {
        resolve(result || '')
      }
    })
  })
}

export { configureTemplates, render, resetTemplates }
