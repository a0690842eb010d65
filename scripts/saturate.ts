#!/usr/bin/env tsx

/**
 * Saturation script - fire concurrent chat completions at a gateway and watch its queue
 *
 * Usage:
 *   npm run saturate -- [gateway_url] [total_requests] [concurrency]
 *
 * Example:
 *   npm run saturate -- http://localhost:8000 20 8
 *
 * Environment:
 *   SATURATE_PROMPT: prompt sent with every request (default: a short counting task)
 */

interface QueueStatus {
  capacity: number
  active: number
  queued: number
  oldest_wait_seconds: number
}

function isQueueStatus(value: unknown): value is QueueStatus {
  return (
    typeof value === 'object' &&
    value !== null &&
    'capacity' in value &&
    'active' in value &&
    'queued' in value &&
    'oldest_wait_seconds' in value
  )
}

async function main() {
  const gatewayUrl = (process.argv[2] || 'http://localhost:8000').replace(/\/+$/, '')
  const total = parseInt(process.argv[3] || '10')
  const concurrency = parseInt(process.argv[4] || '4')
  const prompt = process.env.SATURATE_PROMPT || 'Count from 1 to 20, one number per line.'

  console.log('Gateway saturation run')
  console.log('===============================')
  console.log(`Gateway: ${gatewayUrl}`)
  console.log(`Requests: ${total}`)
  console.log(`Concurrency: ${concurrency}`)
  console.log('===============================\n')

  const statusCounts = new Map<number, number>()
  let failCount = 0
  let index = 0

  // Print the queue snapshot once a second while requests are in flight
  const poller = setInterval(() => {
    fetch(`${gatewayUrl}/v1/queue/status`)
      .then((response) => response.json())
      .then((status: unknown) => {
        if (isQueueStatus(status)) {
          console.log(
            `  queue: active ${status.active}/${status.capacity}, queued ${status.queued}, oldest ${status.oldest_wait_seconds}s`
          )
        }
      })
      .catch((error: unknown) => {
        console.log(`  queue: unavailable (${error instanceof Error ? error.message : String(error)})`)
      })
  }, 1000)

  async function worker() {
    while (index < total) {
      const currentIndex = index++
      const requestLabel = `[${currentIndex + 1}/${total}]`
      const startTime = Date.now()

      try {
        const response = await fetch(`${gatewayUrl}/v1/chat/completions`, {
          method: 'POST',
          headers: { 'Content-Type': 'application/json' },
          body: JSON.stringify({ messages: [{ role: 'user', content: prompt }] }),
        })
        const text = await response.text()
        const duration = Date.now() - startTime
        statusCounts.set(response.status, (statusCounts.get(response.status) ?? 0) + 1)

        if (response.ok) {
          console.log(`${requestLabel} ${response.status} (${duration}ms)`)
        } else {
          const code = response.headers.get('X-Gateway-Error') ?? 'unknown'
          console.log(`${requestLabel} ${response.status} ${code} (${duration}ms)`)
          console.log(`   Error body: ${text.substring(0, 200)}${text.length > 200 ? '...' : ''}`)
        }
      } catch (error) {
        failCount++
        console.log(`${requestLabel} failed: ${error instanceof Error ? error.message : String(error)}`)
      }
    }
  }

  try {
    const workers = Array.from({ length: Math.min(concurrency, total) }, () => worker())
    await Promise.all(workers)
  } finally {
    clearInterval(poller)
  }

  console.log('\n===============================')
  console.log('Run complete:')
  console.log(`Total: ${total}`)
  for (const [status, count] of [...statusCounts.entries()].sort((a, b) => a[0] - b[0])) {
    console.log(`HTTP ${status}: ${count}`)
  }
  console.log(`Network failures: ${failCount}`)
  console.log('===============================')
}

main().catch((error) => {
  console.error('Fatal error:', error)
  process.exit(1)
})
