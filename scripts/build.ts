import { dirname, resolve } from 'path'
import { build } from 'esbuild'
import { rollup, type OutputAsset, type OutputChunk } from 'rollup'
import { logger } from '../src/logger'

const outDir = 'dist/bundle'
const log = logger.child('bundle')

// esbuild strips the types, rollup joins the modules.
let esbuild = {
  name: 'esbuild',
  resolveId(source: string, importer: string | undefined) {
    return importer && source.startsWith('.') ? resolve(dirname(importer), source + '.ts') : null
  },
  async load(id: string) {
    let { outputFiles } = await build({
      entryPoints: [id],
      sourcemap: 'external',
      write: false,
      outdir: dirname(id),
      format: 'esm',
      target: 'es2020',
    })
    let code = outputFiles.find(file => !file.path.endsWith('.map'))
    let map = outputFiles.find(file => file.path.endsWith('.map'))
    return code && { code: code.text, map: map?.text }
  },
}

let sizeOf = (file: OutputChunk | OutputAsset) =>
  Buffer.byteLength(file.type == 'chunk' ? file.code : file.source)

let main = async () => {
  let t0 = Date.now()
  let bundle = await rollup({ input: 'src/index.ts', plugins: [esbuild] })
  try {
    let { output } = await bundle.write({
      dir: outDir,
      format: 'esm',
      sourcemap: true,
      sourcemapExcludeSources: true,
    })
    for (let file of output) {
      log.info(`${outDir}/${file.fileName}`, `${(sizeOf(file) / 1024).toFixed(1)} kb`)
    }
  } finally {
    await bundle.close()
  }
  log.info(`Done in ${Date.now() - t0}ms`)
}

main().catch(error => {
  log.error(error)
  process.exitCode = 1
})
