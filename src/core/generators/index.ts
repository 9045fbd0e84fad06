// src/core/generators/index.ts
import type { TableGenerator } from "../../types/generator.js";
import type { TableName } from "../../types/schema.js";
import { activitiesGenerator } from "./activities.js";
import { companiesGenerator } from "./companies.js";
import { contactsGenerator } from "./contacts.js";
import { dealProductsGenerator } from "./deal_products.js";
import { dealsGenerator } from "./deals.js";
import { notesGenerator } from "./notes.js";
import { productsGenerator } from "./products.js";
import { tasksGenerator } from "./tasks.js";

export const GENERATORS: Readonly<Record<TableName, TableGenerator>> = {
  companies: companiesGenerator,
  contacts: contactsGenerator,
  deals: dealsGenerator,
  products: productsGenerator,
  deal_products: dealProductsGenerator,
  activities: activitiesGenerator,
  notes: notesGenerator,
  tasks: tasksGenerator,
};
