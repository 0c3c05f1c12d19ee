export const OFFER_SYSTEM_PROMPT =
  "You extract coupon offers from direct mail proofs printed for car dealerships. Reply with JSON only.";

export function buildOfferPrompt(filename: string, metadata: Record<string, unknown>): string {
  return `You are analyzing a Direct Mail PDF proof for a dealership.

File: ${filename}
Metadata: ${JSON.stringify(metadata)}

Please extract the following information about coupon offers from this document:
1. Coupon offer description (e.g., "$500 off", "0% APR for 60 months", "Free oil changes for 1 year")
2. Expiration date (if mentioned)
3. Terms and conditions (brief summary)
4. Target vehicle models or types (if specified)
5. Any special requirements or restrictions

Format your response as a structured JSON object with the following keys:
- offers: List of offer descriptions
- expiration_date: The expiration date if found, otherwise null
- terms: Brief summary of terms and conditions
- target_vehicles: List of vehicle models or types
- restrictions: Any special requirements

If no coupon information is found, return an empty offers list.
`;
}
