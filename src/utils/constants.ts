export const COOKIE_NAME = "auth_token";

export const SERVICE_NAME = "docufill";

export const SUPPORTED_DOCUMENT_EXTENSIONS = [".pdf", ".docx", ".txt"] as const;
export const TEMPLATE_EXTENSION = ".docx";

export const DOCX_MIME_TYPE =
  "application/vnd.openxmlformats-officedocument.wordprocessingml.document";

export const MIME_TYPES: Record<string, string> = {
  ".pdf": "application/pdf",
  ".docx": DOCX_MIME_TYPE,
  ".txt": "text/plain",
};

export const NO_CONTEXT_ANSWER =
  "I couldn't find any relevant information in the documents to answer your question.";
export const NO_TEMPLATE_CONTEXT_ANSWER =
  "I couldn't find any relevant information in the documents to process your template.";
