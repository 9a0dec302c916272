import axios, { type AxiosInstance } from 'axios'
import type { z } from 'zod'
import { ProtocolViolation, TransportError, describeError } from '../errors'
import { AccessAckSchema, ReleaseAckSchema, formatIssues } from '../schemas/protocol'
import type { AccessAck, AccessRequest, PeerRecord, ReleaseAck, ReleaseNotice } from '../types'
import { resolveEndpoint } from './endpoint'
import type { PeerTransport } from './peer-transport'

export interface HttpPeerTransportOptions {
  timeoutMs: number
  http?: AxiosInstance
}

/**
 * HttpPeerTransport - Peer calls as JSON over HTTP (axios)
 *
 * Each call is independent; nothing is retried.
 */
export class HttpPeerTransport implements PeerTransport {
  private readonly http: AxiosInstance

  constructor(private readonly options: HttpPeerTransportOptions) {
    this.http = options.http ?? axios.create({ headers: { 'Content-Type': 'application/json' } })
  }

  async requestAccess(peer: PeerRecord, request: AccessRequest): Promise<AccessAck> {
    return this.post(peer, '/mutex/request', request, AccessAckSchema)
  }

  async releaseAccess(peer: PeerRecord, notice: ReleaseNotice): Promise<ReleaseAck> {
    return this.post(peer, '/mutex/release', notice, ReleaseAckSchema)
  }

  private async post<T>(peer: PeerRecord, path: string, body: object, schema: z.ZodType<T>): Promise<T> {
    const url = resolveEndpoint(peer.endpoint, path)

    let data: unknown
    try {
      const response = await this.http.post(url, body, { timeout: this.options.timeoutMs })
      data = response.data
    } catch (error) {
      if (axios.isAxiosError(error) && error.response?.status === 409) {
        throw new ProtocolViolation(`Peer ${peer.peerId} rejected ${path}: ${describeBody(error.response.data)}`, {
          peerId: peer.peerId,
        })
      }
      throw new TransportError(`Peer ${peer.peerId} at ${peer.endpoint} unreachable: ${describeError(error)}`, {
        peerId: peer.peerId,
        cause: error,
      })
    }

    const parsed = schema.safeParse(data)
    if (!parsed.success) {
      throw new TransportError(
        `Malformed response from peer ${peer.peerId} for ${path}: ${formatIssues(parsed.error).join('; ')}`,
        { peerId: peer.peerId }
      )
    }
    return parsed.data
  }
}

function describeBody(body: unknown): string {
  if (typeof body === 'object' && body !== null && 'error' in body && typeof body.error === 'string') {
    return body.error
  }
  return 'conflict'
}
