import axios, { AxiosAdapter, AxiosInstance, AxiosResponse } from 'axios'
import { Client, fail, info, InvokeResult, ok, thrownOutcome, timeoutOutcome } from 'client-protocol'
import { ClientFunction, Invocation } from 'core-types'
import { failMe } from 'misc'
import { z } from 'zod'

export const KEY_NOT_FOUND = 100
export const COMPARE_FAILED = 101

const EtcdResponse = z.object({
  errorCode: z.number().optional(),
  message: z.string().optional(),
  node: z.object({ value: z.string().optional() }).optional(),
})

export interface EtcdClientOptions {
  port?: number
  quorumRead?: boolean
  requestTimeoutMs: number
  /**
   * Replaces the HTTP transport (e.g., with an in-process stand-in).
   */
  adapter?: AxiosAdapter
}

/**
 * A register client for etcd's v2 keys API. Register `k` is stored under `/v2/keys/<k>`; a cas is a conditional PUT
 * (`prevValue`) that etcd applies atomically.
 */
export class EtcdClient implements Client {
  private http: AxiosInstance | undefined

  constructor(private readonly options: EtcdClientOptions) {}

  async open(node: string) {
    this.http = axios.create({
      baseURL: `http://${node}:${this.options.port ?? 2379}`,
      timeout: this.options.requestTimeoutMs,
      validateStatus: () => true,
      adapter: this.options.adapter,
    })
  }

  async setup() {}

  async invoke(invocation: Invocation): Promise<InvokeResult> {
    const http = this.http ?? failMe('client is not open')
    const path = `/v2/keys/${invocation.key}`
    try {
      if (invocation.f === 'read') {
        const resp = await http.get(path, { params: { quorum: this.options.quorumRead ?? false } })
        const body = parse(resp)
        if (resp.status === 404 && body.errorCode === KEY_NOT_FOUND) {
          return ok(null)
        }
        if (resp.status !== 200) {
          return fail(describe(resp, body))
        }
        const value = Number(body.node?.value)
        return Number.isInteger(value) ? ok(value) : fail(`unexpected value: ${body.node?.value}`)
      }

      if (invocation.f === 'write') {
        const resp = await http.put(path, new URLSearchParams({ value: String(invocation.value) }))
        return resp.status === 200 || resp.status === 201 ? ok() : info(describe(resp, parse(resp)))
      }

      const [expected, replacement] = invocation.value
      const resp = await http.put(path, new URLSearchParams({ value: String(replacement) }), {
        params: { prevValue: expected },
      })
      const body = parse(resp)
      if (resp.status === 200) {
        return ok()
      }
      if (body.errorCode === KEY_NOT_FOUND || body.errorCode === COMPARE_FAILED) {
        return fail(body.message)
      }
      return info(describe(resp, body))
    } catch (e) {
      return transportOutcome(invocation.f, e)
    }
  }

  async teardown() {}

  async close() {
    this.http = undefined
  }
}

function parse(resp: AxiosResponse<unknown>): z.infer<typeof EtcdResponse> {
  const parsed = EtcdResponse.safeParse(resp.data)
  return parsed.success ? parsed.data : {}
}

function describe(resp: AxiosResponse<unknown>, body: z.infer<typeof EtcdResponse>) {
  return `HTTP ${resp.status}${body.message ? `: ${body.message}` : ''}`
}

/**
 * A refused connection proves that the request never reached the server. A timeout, or any other transport error,
 * leaves a mutation's effect unknown.
 */
export function transportOutcome(f: ClientFunction, e: unknown): InvokeResult {
  if (axios.isAxiosError(e)) {
    if (e.code === 'ECONNREFUSED') {
      return fail('connection refused')
    }
    if (e.code === 'ECONNABORTED' || e.code === 'ETIMEDOUT') {
      return timeoutOutcome(f)
    }
  }
  return thrownOutcome(f, e)
}
