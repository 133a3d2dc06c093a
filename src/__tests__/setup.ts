import { vi } from 'vitest'

// Services announce lifecycle events on the console; keep test output readable
console.log = vi.fn()
console.warn = vi.fn()
console.error = vi.fn()
