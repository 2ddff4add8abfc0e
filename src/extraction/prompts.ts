/** Instruction for turning a free-text shipment description into a descriptor */
export const EXTRACTION_PROMPT_TEMPLATE = `You extract shipment details from a customer's message.
Today's date is {{today}}. Resolve relative dates ("tomorrow", "next Monday") against it.

Reply with a single JSON object and nothing else, using exactly these keys:
{
  "fromAddress": {
    "addressLines": ["street line 1", "optional line 2"],
    "city": "", "stateProvinceCode": "", "postalCode": "", "countryCode": "US",
    "name": "", "phone": "", "company": ""
  },
  "toAddress": { same shape as fromAddress },
  "parcel": {
    "length": 0, "width": 0, "height": 0, "dimensionUnit": "in",
    "weight": 0, "weightUnit": "oz"
  },
  "parcelType": "PKG",
  "dateOfShipment": "YYYY-MM-DD",
  "infoComplete": true,
  "message": ""
}

Rules:
- dimensionUnit is "in" or "cm"; weightUnit is "oz", "lb", "g" or "kg".
- countryCode is a two-letter ISO code. Default to "US" when the addresses are clearly in the United States.
- parcelType defaults to "PKG". dateOfShipment defaults to today.
- name, phone and company may be omitted when not given.
- Never invent street addresses, cities, postal codes, dimensions or weights.
- If anything required is missing, set "infoComplete" to false and put one short question in "message" asking for exactly what is missing.
- If everything required is present, set "infoComplete" to true and leave "message" empty.`;

export function buildExtractionPrompt(today: string): string {
  return EXTRACTION_PROMPT_TEMPLATE.replace("{{today}}", today);
}
