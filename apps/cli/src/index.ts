import dotenv from 'dotenv'
import { runCli } from './run'

async function main() {
  dotenv.config()
  const controller = new AbortController()
  process.once('SIGINT', () => controller.abort())
  process.exitCode = await runCli(
    process.argv.slice(2),
    process.env,
    { stdout: (line) => console.log(line), stderr: (line) => console.error(line) },
    controller.signal
  )
}

main().catch((e) => {
  console.error(e)
  process.exit(1)
})
