import { z } from "zod";

/**
 * Canonical output record of the extractor. Every leaf is a string and "" means absent.
 * Field order here is the order of `missing_fields` in the validation report.
 */

const text = (description: string) =>
  z.string().trim().default("").describe(description);

const part = (description: string) => z.string().default("").describe(description);

const dateTripleSchema = z.object({
  day: part("Day of month, digits only"),
  month: part("Month, digits only"),
  year: part("Four-digit year"),
});

const addressSchema = z.object({
  street: part("רחוב"),
  houseNumber: part("מספר בית"),
  entrance: part("כניסה"),
  apartment: part("דירה"),
  city: part("ישוב"),
  postalCode: part("מיקוד"),
  poBox: part("תא דואר"),
});

const medicalInstitutionFieldsSchema = z.object({
  healthFundMember: part("חבר בקופת חולים"),
  natureOfAccident: part("מהות התאונה"),
  medicalDiagnoses: part("אבחנות רפואיות"),
});

export const extractedFormSchema = z.object({
  lastName: text("שם משפחה"),
  firstName: text("שם פרטי"),
  idNumber: text("ת.ז - Israeli ID, digits only"),
  gender: text("מין"),
  dateOfBirth: dateTripleSchema.default({}).describe("תאריך לידה"),
  address: addressSchema.default({}).describe("כתובת"),
  landlinePhone: text("טלפון קווי"),
  mobilePhone: text("טלפון נייד"),
  jobType: text("סוג העבודה"),
  dateOfInjury: dateTripleSchema.default({}).describe("תאריך הפגיעה"),
  timeOfInjury: text("שעת הפגיעה"),
  accidentLocation: text("מקום התאונה"),
  accidentAddress: text("כתובת מקום התאונה"),
  accidentDescription: text("תיאור התאונה"),
  injuredBodyPart: text("האיבר שנפגע"),
  signature: text("חתימה"),
  formFillingDate: dateTripleSchema.default({}).describe("תאריך מילוי הטופס"),
  formReceiptDateAtClinic: dateTripleSchema
    .default({})
    .describe("תאריך קבלת הטופס בקופה"),
  medicalInstitutionFields: medicalInstitutionFieldsSchema
    .default({})
    .describe("למילוי ע\"י המוסד הרפואי"),
});

export type DateTriple = z.infer<typeof dateTripleSchema>;
export type ExtractedForm = z.infer<typeof extractedFormSchema>;

export const DATE_FIELDS = [
  "dateOfBirth",
  "dateOfInjury",
  "formFillingDate",
  "formReceiptDateAtClinic",
] as const;

export function emptyForm(): ExtractedForm {
  return extractedFormSchema.parse({});
}
