/** One vacancy as it goes into the `vacancies` upsert. */
export interface ScrapedVacancy {
  source: 'hh';
  external_id: string;
  city_slug: string;
  city: string | null;
  title: string;
  employer: string | null;
  employer_trusted: boolean | null;
  external_url: string;
  salary_from: number | null;
  salary_to: number | null;
  salary_from_net: number | null;
  salary_to_net: number | null;
  currency: string | null;
  gross: boolean | null;
  salary_period_id: string | null;
  salary_period_name: string | null;
  salary_frequency_id: string | null;
  salary_frequency_name: string | null;
  schedule_name: string | null;
  work_schedule_by_days: string | null;
  working_hours: string | null;
  experience_name: string | null;
  employment_form_name: string | null;
  published_at: string;
}
