import express from "express";

export const app = express();

app.get("/start", (_req, res) => {
  res.json({ route: "start" });
});

app.get("/callback", (req, res) => {
  res.json({ route: "callback", code: req.query.code ?? null });
});
