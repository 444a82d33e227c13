import { describe, it, expect } from "vitest";
import { toTemplateView } from "./template_service.js";
import { BadRequestError, NotFoundError } from "../utils/errors.js";
import { createHarness } from "../../test/support/app.js";
import { buildDocx, readDocxParagraphs } from "../../test/support/docx.js";

const invoice = () => buildDocx(["Invoice for {{client}}", "Total: {{amount}}"]);

const setup = async () => {
  const h = createHarness();
  const templates = h.services.templates;
  const template = await templates.create({
    userId: "user-1",
    name: "Invoice",
    description: "Monthly invoice",
    metadata: { category: "billing" },
    file: invoice(),
  });
  return { h, templates, template };
};

describe("TemplateService", () => {
  it("stores the file and records its variables", async () => {
    const { h, template } = await setup();

    expect(template.storageKey).toBe(`templates/user-1/${template.id}.docx`);
    expect(h.storage.objects.get(template.storageKey)?.contentType).toBe(
      "application/vnd.openxmlformats-officedocument.wordprocessingml.document"
    );
    expect(toTemplateView(template)).toMatchObject({
      id: template.id,
      name: "Invoice",
      description: "Monthly invoice",
      variables: { amount: "", client: "" },
      metadata: { category: "billing", variables: { amount: "", client: "" } },
      version: 1,
      is_active: true,
    });
  });

  it("rejects files that are not a DOCX without storing anything", async () => {
    const h = createHarness();

    await expect(
      h.services.templates.create({
        userId: "user-1",
        name: "Broken",
        description: null,
        file: Buffer.from("plain text"),
      })
    ).rejects.toThrow(/^Invalid template: Could not load template: /);
    expect(h.storage.objects.size).toBe(0);
  });

  it("hides other users' templates", async () => {
    const { templates, template } = await setup();

    await expect(templates.get(template.id, "user-2")).rejects.toThrow(new NotFoundError("Template not found"));
    await expect(templates.delete(template.id, "user-2")).rejects.toThrow(NotFoundError);
    expect(await templates.list("user-2")).toEqual([]);
  });

  it("lists active templates by name unless asked for all", async () => {
    const { templates, template } = await setup();
    await templates.create({ userId: "user-1", name: "Agreement", description: null, file: invoice() });
    await templates.update(template.id, "user-1", { isActive: false });

    expect((await templates.list("user-1")).map((t) => t.name)).toEqual(["Agreement"]);
    expect((await templates.list("user-1", true)).map((t) => t.name)).toEqual(["Agreement", "Invoice"]);
  });

  it("keeps metadata.variables in step with the variables on update", async () => {
    const { templates, template } = await setup();

    const updated = await templates.update(template.id, "user-1", {
      name: "Invoice v2",
      metadata: { category: "finance" },
    });

    expect(updated.name).toBe("Invoice v2");
    expect(updated.version).toBe(1);
    expect(updated.metadata).toEqual({ category: "finance", variables: { amount: "", client: "" } });
  });

  it("replaces the file, re-reads the variables and bumps the version", async () => {
    const { h, templates, template } = await setup();
    const next = buildDocx(["Receipt for {{client}}", "Paid on {{paid_on}}"]);

    const updated = await templates.replaceFile(template.id, "user-1", next);

    expect(updated.version).toBe(2);
    expect(updated.variables).toEqual({ client: "", paid_on: "" });
    expect(updated.metadata).toEqual({ category: "billing", variables: { client: "", paid_on: "" } });
    expect(readDocxParagraphs(await h.storage.get(template.storageKey))).toEqual([
      "Receipt for {{client}}",
      "Paid on {{paid_on}}",
    ]);
  });

  it("renders, stores and links a filled copy", async () => {
    const { h, templates, template } = await setup();

    const { outputFile, downloadUrl } = await templates.process(template.id, "user-1", {
      client: "Acme Ltd",
      amount: "1,200.00",
    });

    expect(outputFile).toMatch(new RegExp(`^generated/user-1/${template.id}/\\d+\\.docx$`));
    expect(downloadUrl).toBe(`https://storage.test/${outputFile}`);
    expect(readDocxParagraphs(await h.storage.get(outputFile))).toEqual([
      "Invoice for Acme Ltd",
      "Total: 1,200.00",
    ]);
  });

  it("requires every variable when processing strictly", async () => {
    const { h, templates, template } = await setup();

    await expect(templates.process(template.id, "user-1", { client: "Acme Ltd" })).rejects.toThrow(
      new BadRequestError("Missing required variables: amount")
    );
    expect([...h.storage.objects.keys()]).toEqual([template.storageKey]);
  });

  it("deletes the stored file with the record", async () => {
    const { h, templates, template } = await setup();

    await templates.delete(template.id, "user-1");

    expect(h.storage.objects.size).toBe(0);
    await expect(templates.get(template.id, "user-1")).rejects.toThrow(NotFoundError);
  });
});
