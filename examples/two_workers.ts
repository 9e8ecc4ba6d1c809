#!/usr/bin/env -S node --import tsx
// Run: node --import tsx examples/two_workers.ts

import { Lockstep } from '../src/index.js'

const delay = (ms: number): Promise<void> => new Promise((resolve) => setTimeout(resolve, ms))

async function main(): Promise<void> {
  const ls = new Lockstep()
  ls.setVerbose(true)

  const work_ms = 300

  // 1) Two workers park until the main task releases them.
  const worker = async (go: string, done: string): Promise<void> => {
    await ls.wait(go)
    await delay(work_ms)
    await ls.emit(done)
  }
  const workers = Promise.all([worker('go1', 'done1'), worker('go2', 'done2')])

  // 2) Release both, then join on both results in whichever order they arrive.
  const begin = performance.now()
  await ls.emit('go1')
  await ls.emit('go2')
  await ls.wait('done1', 'done2')
  const elapsed_ms = performance.now() - begin
  await workers

  console.log(`both workers finished in ${elapsed_ms.toFixed(1)}ms (each worked ${work_ms}ms)`)
}

main().catch((error: unknown) => {
  console.error(error)
  process.exitCode = 1
})
