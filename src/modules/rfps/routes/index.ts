import { Router, type RequestHandler } from "express";
import multer from "multer";
import { ValidationError } from "../../../lib/errors";
import { asyncRoute } from "../../../lib/http";
import { parseOrThrow } from "../../../lib/validation";
import { currentUser } from "../../../middleware/auth";
import type { RfpService } from "../services/rfpService";
import {
  rfpIdParamsSchema,
  updateRfpSchema,
  uploadRfpSchema,
} from "../validators";

type RfpsRouterOptions = {
  rfps: RfpService;
  requireAuth: RequestHandler;
  maxUploadBytes: number;
};

export function createRfpsRouter({
  rfps,
  requireAuth,
  maxUploadBytes,
}: RfpsRouterOptions): Router {
  const router = Router();

  // Bytes go straight to the FileStore; nothing lands in a temp dir
  const upload = multer({
    storage: multer.memoryStorage(),
    limits: {
      fileSize: maxUploadBytes,
      files: 1,
    },
  });

  // POST /upload-rfp -> multipart: title, file
  // Auth runs before multer so anonymous uploads are never buffered
  router.post(
    "/upload-rfp",
    requireAuth,
    upload.single("file"),
    asyncRoute(async (req, res) => {
      const { title } = parseOrThrow(uploadRfpSchema, req.body);
      if (!req.file) {
        throw new ValidationError("Missing file (field name must be 'file')");
      }

      const { id } = await rfps.upload(
        {
          title,
          // busboy reads the multipart filename as latin1
          originalFilename: Buffer.from(req.file.originalname, "latin1").toString("utf8"),
          bytes: req.file.buffer,
        },
        currentUser(req)
      );

      res.json({ message: `RFP '${title}' uploaded successfully.`, rfp_id: id });
    })
  );

  // GET /rfps -> every RFP the caller owns
  router.get(
    "/rfps",
    requireAuth,
    asyncRoute(async (req, res) => {
      res.json(await rfps.list(currentUser(req)));
    })
  );

  router.get(
    "/rfp/:id",
    requireAuth,
    asyncRoute(async (req, res) => {
      const { id } = parseOrThrow(rfpIdParamsSchema, req.params);
      res.json(await rfps.get(id, currentUser(req)));
    })
  );

  // PUT /rfp/:id -> overwrite draft + cover fields (last write wins)
  router.put(
    "/rfp/:id",
    requireAuth,
    asyncRoute(async (req, res) => {
      const { id } = parseOrThrow(rfpIdParamsSchema, req.params);
      const fields = parseOrThrow(updateRfpSchema, req.body);
      res.json(await rfps.updateDraft(id, currentUser(req), fields));
    })
  );

  // POST /generate-draft/:id -> extract text, call the model, persist
  router.post(
    "/generate-draft/:id",
    requireAuth,
    asyncRoute(async (req, res) => {
      const { id } = parseOrThrow(rfpIdParamsSchema, req.params);
      res.json(await rfps.generateDraft(id, currentUser(req)));
    })
  );

  return router;
}
