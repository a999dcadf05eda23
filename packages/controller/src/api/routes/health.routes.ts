import { Router, Request, Response } from 'express'
import type { ControllerStatus } from '../../services/limits-controller.service'

/**
 * Source of the status the probes report
 */
export interface StatusProvider {
  getStatus(): ControllerStatus
}

/**
 * Liveness, readiness and last-cycle status for the controller
 */
export const createHealthRouter = (controller: StatusProvider): Router => {
  const router: Router = Router()

  /**
   * GET /healthz
   * Kubernetes liveness probe
   */
  router.get('/healthz', (_req: Request, res: Response) => {
    res.status(200).json({ status: 'ok' })
  })

  /**
   * GET /readyz
   * Ready once a reconciliation cycle has published the generated ConfigMap
   */
  router.get('/readyz', (_req: Request, res: Response) => {
    const { lastCycle } = controller.getStatus()
    if (!lastCycle) {
      res.status(503).json({ status: 'not_ready', reason: 'No reconciliation cycle has completed yet' })
      return
    }
    res.status(200).json({ status: 'ready', lastReconciledAt: lastCycle.finishedAt })
  })

  /**
   * GET /status
   * Outcome of the most recent cycle
   */
  router.get('/status', (_req: Request, res: Response) => {
    res.json(controller.getStatus())
  })

  return router
}
