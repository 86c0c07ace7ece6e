// Task, taxonomy and pass rules for each predefined habit type.
export const predefinedHabits = {
  healthyBreakfast: {
    task: "TASK: Verify this photo shows a HEALTHY BREAKFAST.",
    labels: [
      { label: "healthy_meal", description: "fruits, vegetables, eggs, oatmeal, yogurt, whole grains, smoothie, avocado toast" },
      { label: "unhealthy_meal", description: "donuts, sugary cereal, pastries, candy, chips" },
      { label: "beverage_only", description: "just coffee/tea with no food" },
      { label: "screenshot", description: "photo of a screen" },
      { label: "other", description: "unrelated content" },
    ],
    pass: [
      "Nutritious food visible: eggs, avocado, oatmeal, yogurt, fruit, vegetables, whole grain toast, smoothie",
      "Mixed meals count if they include healthy components",
    ],
    fail: [
      "Only sugary/processed foods (donuts, pastries, sugary cereal)",
      "No food visible (beverage only)",
      "Unrelated content",
    ],
    note: "Be encouraging about healthy eating choices!",
    feedback: [
      "If passed: Celebrate the healthy choice! (\"Great choice! Protein and fiber to fuel your morning.\")",
      "If failed (unhealthy): Gentle nudge (\"That looks tasty, but try adding some fruit or eggs!\")",
      "If unrelated: \"I see [what's there], but where's your breakfast?\"",
    ],
  },
  morningJournal: {
    task: "TASK: Verify this photo shows a JOURNAL with writing.",
    labels: [
      { label: "journal_writing", description: "open notebook/journal with visible handwriting" },
      { label: "journal_closed", description: "closed notebook or journal" },
      { label: "journal_blank", description: "open but blank pages" },
      { label: "digital_journal", description: "tablet or phone showing notes app with writing" },
      { label: "screenshot", description: "photo of a screen showing something else" },
      { label: "other", description: "unrelated content" },
    ],
    pass: [
      "Open journal/notebook with visible handwriting (doesn't need to be readable)",
      "Digital notes app showing today's writing",
    ],
    fail: [
      "Closed journal (no proof of writing)",
      "Blank pages",
      "Unrelated content",
    ],
    feedback: [
      "If passed: Acknowledge the effort (\"Love to see those morning thoughts on paper!\")",
      "If closed: \"Open it up and show me today's entry!\"",
      "If blank: \"Those pages look empty - time to write!\"",
    ],
  },
  vitamins: {
    task: "TASK: Verify this photo shows VITAMINS or SUPPLEMENTS being taken.",
    labels: [
      { label: "vitamins_visible", description: "vitamin bottles, pill organizers, loose vitamins/supplements" },
      { label: "person_taking", description: "someone holding or taking vitamins" },
      { label: "pill_organizer", description: "weekly pill organizer with compartments" },
      { label: "screenshot", description: "photo of a screen" },
      { label: "other", description: "unrelated content" },
    ],
    pass: [
      "Vitamins, supplements, or pill organizer visible",
      "Person actively taking vitamins",
    ],
    fail: [
      "No vitamins or supplements visible",
      "Unrelated content",
    ],
    note: "Be encouraging - taking vitamins is a great habit!",
    feedback: [
      "If passed: \"Nice! Keeping up with your supplements.\"",
      "If wrong subject: \"I see [what's there], but where are your vitamins?\"",
    ],
  },
  skincare: {
    task: "TASK: Verify this photo shows SKINCARE products or routine.",
    labels: [
      { label: "skincare_products", description: "moisturizer, serum, sunscreen, cleanser, toner" },
      { label: "person_applying", description: "someone applying skincare products" },
      { label: "makeup_only", description: "only makeup products (not skincare)" },
      { label: "screenshot", description: "photo of a screen" },
      { label: "other", description: "unrelated content" },
    ],
    pass: [
      "Skincare products visible (moisturizer, sunscreen, serum, cleanser, etc.)",
      "Person applying skincare",
    ],
    fail: [
      "Only makeup products (no skincare)",
      "Unrelated content",
    ],
    feedback: [
      "If passed: \"Your skin will thank you! Great routine.\"",
      "If makeup only: \"I see makeup, but show me your skincare products!\"",
      "If unrelated: \"I see [what's there], but where's your skincare?\"",
    ],
  },
  mealPrep: {
    task: "TASK: Verify this photo shows MEAL PREP.",
    labels: [
      { label: "meal_containers", description: "food storage containers with prepared meals" },
      { label: "packed_lunch", description: "lunch box or bag with food" },
      { label: "prep_in_progress", description: "actively cooking or chopping ingredients" },
      { label: "groceries", description: "raw ingredients not being prepped" },
      { label: "screenshot", description: "photo of a screen" },
      { label: "other", description: "unrelated content" },
    ],
    pass: [
      "Meal prep containers with food inside",
      "Packed lunch/lunchbox ready to go",
      "Active food preparation (cooking, chopping, assembling)",
    ],
    fail: [
      "Empty containers",
      "Just raw groceries sitting there",
      "Unrelated content",
    ],
    feedback: [
      "If passed: \"Prepped and ready! That's setting yourself up for success.\"",
      "If groceries: \"Great ingredients! Now let's see them prepped.\"",
      "If unrelated: \"I see [what's there], but where's your meal prep?\"",
    ],
  },
};
