export interface Expense {
  id: number
  description: string
  amount: number
  /** YYYY-MM-DD */
  date: string
  category: string
  userId: number
}

export interface DateRange {
  startDate?: string
  endDate?: string
}

export interface ExpenseListing {
  expenses: Expense[]
  /** Bounds actually applied after invalid ones were dropped. */
  filters: DateRange
  warnings: string[]
}

export interface CategoryTotal {
  category: string
  total: number
}

export interface MonthlyTotal {
  /** 1..12 */
  month: number
  label: string
  total: number
}

export interface DashboardData {
  labels: string[]
  values: number[]
  monthlyLabels: string[]
  monthlyData: number[]
}

export interface CsvDocument {
  filename: string
  contentType: string
  body: string
}
