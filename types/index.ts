// ---- Backlog scheduling ----

export interface Task {
    name: string;
    hours: number; // effort, >= 0
    dueDate: Date | null; // null = no deadline
}

export interface DayAssignment {
    dayIndex: number; // 1-based working day, not a calendar date
    tasks: Task[];
    totalHours: number;
    isOverloaded: boolean;
}

export interface ParseResult {
    tasks: Task[];
    errors: string[];
}

// ---- What-if calculator ----

export interface WhatIfInput {
    taskCount: number;
    averageHours: number;
    dailyCapacityHours: number;
}

export interface WhatIfEstimate {
    totalHours: number;
    estimatedDays: number;
}

export interface OptimizationGoal {
    title: string;
    description: string;
}

// ---- KPI production report ----

export interface ProductionRow {
    line: string;
    shift: string;
    units: number;
    target: number;
    scrapPct: number;
    downtimeHours: number;
}

export interface ProductionRowMetrics extends ProductionRow {
    variance: number; // units - target
    attainment: number; // units / target, 0 when target is 0
}

export interface HeadlineKpis {
    totalUnits: number;
    totalTarget: number;
    totalVariance: number;
    averageAttainment: number;
    averageScrapPct: number;
    totalDowntimeHours: number;
}

// ---- PDF finder ----

export interface PdfEntry {
    relativePath: string;
    sizeBytes: number;
    modifiedAt: string; // ISO timestamp
}

export interface PdfListing {
    baseDir: string;
    files: PdfEntry[];
}
