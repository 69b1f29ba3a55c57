import path from "path";
import {
  NotFoundError,
  UnprocessableDocumentError,
  UpstreamError,
} from "../../../lib/errors";
import { errorContext, logger } from "../../../lib/logger";
import { todayIsoDate } from "../../../lib/validation";
import type { AuthUser } from "../../auth/types";
import type { TextExtractor } from "../lib/textExtractor";
import {
  buildExecutiveSummaryPrompt,
  truncateRfpText,
} from "../prompts/executive_summary_v1";
import type {
  GeneratedDraft,
  RfpDetail,
  RfpRow,
  RfpSummary,
  RfpUpdate,
} from "../types";
import type { DraftGenerator } from "./draftGenerator";
import type { FileStore } from "./fileStore";
import type { RfpRepository } from "./rfpRepository";

export type UploadInput = {
  title: string;
  originalFilename: string;
  bytes: Buffer;
};

type RfpServiceDeps = {
  rfps: RfpRepository;
  files: FileStore;
  extractor: TextExtractor;
  generator: DraftGenerator;
  now?: () => Date;
};

export function toRfpDetail(row: RfpRow): RfpDetail {
  return {
    id: row.id,
    title: row.title,
    filename: row.original_filename,
    draft_text: row.draft_text,
    company_name: row.company_name,
    document_type: row.document_type,
    submission_date: row.submission_date,
  };
}

export class RfpService {
  private readonly now: () => Date;

  constructor(private readonly deps: RfpServiceDeps) {
    this.now = deps.now ?? (() => new Date());
  }

  /**
   * Stores the bytes, then the row. The upload is not checked for being a
   * PDF; unreadable files surface when a draft is generated.
   */
  async upload(input: UploadInput, owner: AuthUser): Promise<{ id: number }> {
    const stored = await this.deps.files.save(input.bytes);

    try {
      const row = await this.deps.rfps.create({
        title: input.title,
        original_filename: path.basename(input.originalFilename),
        storage_key: stored.key,
        file_sha256: stored.sha256,
        file_size_bytes: stored.sizeBytes,
        company_name: owner.default_company_name,
        document_type: owner.default_document_type,
        submission_date: owner.default_submission_date ?? todayIsoDate(this.now()),
        user_id: owner.id,
      });

      logger.info("RFP uploaded", {
        rfp_id: row.id,
        user_id: owner.id,
        size_bytes: stored.sizeBytes,
      });
      return { id: row.id };
    } catch (err) {
      // don't leave an orphan blob behind a failed insert
      await this.deps.files.remove(stored.key).catch((cleanupErr: unknown) =>
        logger.warn("Failed to remove orphaned upload", {
          storage_key: stored.key,
          ...errorContext(cleanupErr),
        })
      );
      throw err;
    }
  }

  async list(owner: AuthUser): Promise<RfpSummary[]> {
    const rows = await this.deps.rfps.listByOwner(owner.id);
    return rows.map(toRfpDetail);
  }

  async get(id: number, owner: AuthUser): Promise<RfpDetail> {
    return toRfpDetail(await this.requireOwned(id, owner));
  }

  async generateDraft(id: number, owner: AuthUser): Promise<GeneratedDraft> {
    const rfp = await this.requireOwned(id, owner);

    const bytes = await this.deps.files.read(rfp.storage_key);
    if (!bytes) {
      throw new NotFoundError("RFP file not found");
    }

    let fullText: string;
    try {
      fullText = await this.deps.extractor.extractText(bytes);
    } catch (err) {
      logger.warn("Text extraction failed", { rfp_id: id, ...errorContext(err) });
      throw new UnprocessableDocumentError();
    }

    const rfpText = truncateRfpText(fullText);

    let draft: string;
    try {
      draft = await this.deps.generator.complete(buildExecutiveSummaryPrompt(rfpText));
    } catch (err) {
      logger.error("Draft generation failed", {
        rfp_id: id,
        ...errorContext(err),
        cause: err instanceof Error && err.cause instanceof Error ? err.cause.message : undefined,
      });
      throw err instanceof UpstreamError
        ? err
        : new UpstreamError("Draft generation failed", { cause: err });
    }

    // Owner is re-checked by the UPDATE itself
    const saved = await this.deps.rfps.saveDraft(id, owner.id, draft);
    if (!saved) {
      throw new NotFoundError();
    }

    logger.info("Draft generated", {
      rfp_id: id,
      input_chars: rfpText.length,
      output_chars: draft.length,
    });

    return { rfp_id: saved.id, title: saved.title, draft };
  }

  async updateDraft(
    id: number,
    owner: AuthUser,
    fields: RfpUpdate
  ): Promise<{ message: string; rfp_id: number }> {
    const saved = await this.deps.rfps.update(id, owner.id, fields);
    if (!saved) {
      throw new NotFoundError();
    }
    return { message: "Draft updated successfully", rfp_id: saved.id };
  }

  private async requireOwned(id: number, owner: AuthUser): Promise<RfpRow> {
    const rfp = await this.deps.rfps.findOwned(id, owner.id);
    if (!rfp) {
      throw new NotFoundError();
    }
    return rfp;
  }
}
