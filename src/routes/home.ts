import { Router } from "express";
import type { Request, Response } from "express";
import { noteSchema } from "../validators/note";

export const router = Router();

export const renderHome = (_req: unknown, res: Pick<Response, "render">) => {
  res.render("home", { title: "Notes" });
};

export const createNote = (
  req: Pick<Request, "body" | "flash">,
  res: Pick<Response, "redirect">
) => {
  const result = noteSchema.safeParse(req.body);
  if (!result.success) {
    req.flash(result.error.issues[0]?.message ?? "Invalid note.");
    return res.redirect("/");
  }
  req.flash(result.data.message);
  res.redirect("/");
};

// For clients that never render a page
export const listNotes = (req: Pick<Request, "flashFlush">, res: Pick<Response, "json">) => {
  res.json({ notes: req.flashFlush() ?? null });
};

router.get("/", renderHome);
router.post("/notes", createNote);
router.get("/api/notes", listNotes);
