import type { NextApiRequest, NextApiResponse } from "next";

import { rejectMethod, sendError } from "../../../src/api/responses";
import { openArchiveStore } from "../../../src/store/archive";

export default async function handler(req: NextApiRequest, res: NextApiResponse): Promise<void> {
  if (rejectMethod(req, res, ["GET"])) {
    return;
  }

  try {
    const archive = await openArchiveStore();
    res.status(200).json({ packages: await archive.list() });
  } catch (error) {
    sendError(res, "api/packages", error);
  }
}
