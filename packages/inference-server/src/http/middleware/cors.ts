import { Request, Response, NextFunction, RequestHandler } from 'express'

/** Permissive CORS for the browser front-ends; preflight requests end here with 204. */
export default function cors(allowOrigin: string): RequestHandler {
  return (req: Request, res: Response, next: NextFunction) => {
    res.setHeader('Access-Control-Allow-Origin', allowOrigin)
    res.setHeader('Access-Control-Allow-Methods', 'GET,POST,OPTIONS')
    res.setHeader('Access-Control-Allow-Headers', 'Content-Type,X-Corr-Id')
    res.setHeader('Access-Control-Expose-Headers', 'X-Corr-Id')
    if (req.method === 'OPTIONS') {
      res.status(204).end()
      return
    }
    next()
  }
}
