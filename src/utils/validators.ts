import type { NextFunction, Request, Response } from "express";
import { body, query, type ValidationChain, validationResult } from "express-validator";

export const validate = (validations: ValidationChain[]) => {
  return async (req: Request, res: Response, next: NextFunction) => {
    for (const validation of validations) {
      const result = await validation.run(req);
      if (!result.isEmpty()) {
        break;
      }
    }
    const errors = validationResult(req);
    if (errors.isEmpty()) {
      return next();
    }
    return res.status(422).json({ errors: errors.array() });
  };
};

export const signupValidator = [
  body("username")
    .isString()
    .withMessage("Username is required")
    .bail()
    .trim()
    .matches(/^[A-Za-z0-9_.-]{3,64}$/)
    .withMessage("Username must be 3-64 characters of letters, digits, '_', '.' or '-'"),
  body("password")
    .isString()
    .withMessage("Password is required")
    .bail()
    .isLength({ min: 8 })
    .withMessage("Password should contain at least 8 characters"),
];

export const tokenValidator = [
  body("username").isString().bail().trim().notEmpty().withMessage("Username is required"),
  body("password").isString().bail().notEmpty().withMessage("Password is required"),
];

export const chatQueryValidator = [
  body("query")
    .isString()
    .withMessage("Query is required")
    .bail()
    .trim()
    .isLength({ min: 1, max: 4000 })
    .withMessage("Query must be between 1 and 4000 characters"),
  body("template_id").optional({ values: "null" }).isString().withMessage("template_id must be a string"),
  body("context_window")
    .optional({ values: "null" })
    .isInt({ min: 1, max: 20 })
    .withMessage("context_window must be an integer between 1 and 20")
    .toInt(),
  body("document_id").optional({ values: "null" }).isString().withMessage("document_id must be a string"),
];

export const templateUploadValidator = [
  body("name")
    .isString()
    .withMessage("Template name is required")
    .bail()
    .trim()
    .isLength({ min: 1, max: 200 })
    .withMessage("Template name must be between 1 and 200 characters"),
  body("description").optional().isString().withMessage("Description must be a string").trim(),
];

export const templateUpdateValidator = [
  body("name")
    .optional()
    .isString()
    .bail()
    .trim()
    .isLength({ min: 1, max: 200 })
    .withMessage("Template name must be between 1 and 200 characters"),
  body("description").optional({ values: "null" }).isString().withMessage("Description must be a string"),
  body("metadata").optional().isObject().withMessage("Metadata must be an object"),
  body("is_active").optional().isBoolean({ strict: true }).withMessage("is_active must be a boolean"),
];

export const templateProcessValidator = [
  body().isObject().withMessage("Request body must be a JSON object of template variables"),
];

export const listTemplatesValidator = [
  query("include_inactive").optional().isBoolean().withMessage("include_inactive must be a boolean"),
];
