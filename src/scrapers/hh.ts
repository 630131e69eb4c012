import axios from 'axios';
import { z } from 'zod';
import type { ScrapedVacancy } from './types.js';

const HH_API_URL = 'https://api.hh.ru/vacancies';
const MAX_PAGES = 20;
const PER_PAGE = 100;
const REQUEST_TIMEOUT_MS = 30_000;
const INCOME_TAX_RATE = 0.13;

const BASE_PARAMS = {
  text: 'Курьер',
  search_field: 'name',
  professional_role: 58,
  per_page: PER_PAGE,
  only_with_salary: false,
};

// ---------- Wire format ----------

const named = z.object({ id: z.string().optional(), name: z.string().nullable().optional() }).nullable().optional();

const HhVacancySchema = z.object({
  id: z.union([z.string(), z.number()]).transform(String),
  name: z.string(),
  alternate_url: z.string(),
  published_at: z.string(),
  area: named,
  employer: z
    .object({ name: z.string().optional(), trusted: z.boolean().nullable().optional() })
    .nullable()
    .optional(),
  salary: z
    .object({
      from: z.number().nullable().optional(),
      to: z.number().nullable().optional(),
      currency: z.string().nullable().optional(),
      gross: z.boolean().nullable().optional(),
    })
    .nullable()
    .optional(),
  salary_range: z.object({ mode: named, frequency: named }).nullable().optional(),
  schedule: named,
  work_schedule_by_days: z.array(z.object({ name: z.string() })).nullable().optional(),
  working_hours: z.array(z.object({ name: z.string() })).nullable().optional(),
  experience: named,
  employment_form: named,
});

export type HhVacancy = z.infer<typeof HhVacancySchema>;

export interface HhPage {
  items: unknown[];
  page: number;
  pages: number;
}

export interface HhSearchParams {
  area: number;
  date_from: string;
  date_to: string;
  page: number;
}

export type HhPageFetcher = (params: HhSearchParams) => Promise<HhPage>;

export interface HhSearchResult {
  items: HhVacancy[];
  skipped: number;
  pages: number;
}

// ---------- HTTP ----------

export const fetchHhPage: HhPageFetcher = async (params) => {
  const { data } = await axios.get<HhPage>(HH_API_URL, {
    params: { ...BASE_PARAMS, ...params },
    headers: { 'User-Agent': 'courier-jobs-publisher/0.1' },
    timeout: REQUEST_TIMEOUT_MS,
  });

  return {
    items: Array.isArray(data?.items) ? data.items : [],
    page: data?.page ?? params.page,
    pages: data?.pages ?? 1,
  };
};

export async function searchHh(
  areaId: number,
  window: { dateFrom: string; dateTo: string },
  fetchPage: HhPageFetcher = fetchHhPage
): Promise<HhSearchResult> {
  // Paging is offset-based, so an ad published mid-scan can shift onto the
  // next page and show up twice. One upsert batch must not touch a row twice.
  const byId = new Map<string, HhVacancy>();
  let skipped = 0;
  let page = 0;

  while (page < MAX_PAGES) {
    const result = await fetchPage({
      area: areaId,
      date_from: window.dateFrom,
      date_to: window.dateTo,
      page,
    });

    for (const raw of result.items) {
      const parsed = HhVacancySchema.safeParse(raw);
      if (parsed.success) {
        byId.set(parsed.data.id, parsed.data);
      } else {
        skipped++;
      }
    }

    page++;
    if (page >= result.pages) break;
  }

  return { items: [...byId.values()], skipped, pages: page };
}

// ---------- Mapping ----------

export function toNet(amount: number | null, gross: boolean | null): number | null {
  if (amount == null) return null;
  return gross ? Math.round(amount * (1 - INCOME_TAX_RATE)) : amount;
}

export function toScrapedVacancy(item: HhVacancy, citySlug: string): ScrapedVacancy {
  const salary = item.salary ?? null;
  const salaryFrom = salary?.from ?? null;
  const salaryTo = salary?.to ?? null;
  const gross = salary?.gross ?? null;
  const mode = item.salary_range?.mode ?? null;
  const frequency = item.salary_range?.frequency ?? null;

  return {
    source: 'hh',
    external_id: item.id,
    city_slug: citySlug,
    city: item.area?.name ?? null,
    title: item.name,
    employer: item.employer?.name || null,
    employer_trusted: item.employer?.trusted ?? null,
    external_url: item.alternate_url,
    salary_from: salaryFrom,
    salary_to: salaryTo,
    salary_from_net: toNet(salaryFrom, gross),
    salary_to_net: toNet(salaryTo, gross),
    currency: salary?.currency ?? null,
    gross,
    salary_period_id: mode?.id ?? null,
    salary_period_name: mode?.name ?? null,
    salary_frequency_id: frequency?.id ?? null,
    salary_frequency_name: frequency?.name ?? null,
    schedule_name: item.schedule?.name ?? null,
    work_schedule_by_days: item.work_schedule_by_days?.[0]?.name ?? null,
    working_hours: item.working_hours?.[0]?.name ?? null,
    experience_name: item.experience?.name ?? null,
    employment_form_name: item.employment_form?.name ?? null,
    published_at: item.published_at,
  };
}
