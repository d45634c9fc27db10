import { ColorUtils } from "@/math/Color";
import { Tuple } from "@/math/Tuple";
import type { Color, Material, PointLight, Tuple as TupleValue } from "@/types";

/**
 * Phong reflection at a single surface point: ambient + diffuse + specular.
 *
 * In shadow, only the ambient term survives. The result is not clamped;
 * channels above 1 are clamped when the image is encoded.
 *
 * @param eyeVector - Unit vector from the point toward the eye
 * @param normalVector - Unit surface normal at the point
 */
export function lighting(
  material: Material,
  light: PointLight,
  point: TupleValue,
  eyeVector: TupleValue,
  normalVector: TupleValue,
  inShadow: boolean
): Color {
  const effectiveColor = ColorUtils.multiply(material.color, light.intensity);
  const lightVector = Tuple.normalize(Tuple.subtract(light.position, point));
  const ambient = ColorUtils.scale(effectiveColor, material.ambient);

  if (inShadow) {
    return ambient;
  }

  // Cosine between light and normal; negative means the light is behind the surface
  const lightDotNormal = Tuple.dot(lightVector, normalVector);
  if (lightDotNormal < 0) {
    return ambient;
  }

  const diffuse = ColorUtils.scale(effectiveColor, material.diffuse * lightDotNormal);

  // Cosine between reflection and eye; non-positive means the light reflects away from the eye
  const reflectionVector = Tuple.reflect(Tuple.negate(lightVector), normalVector);
  const reflectDotEye = Tuple.dot(reflectionVector, eyeVector);

  let specular = ColorUtils.black();
  if (reflectDotEye > 0) {
    const factor = Math.pow(reflectDotEye, material.shininess);
    specular = ColorUtils.scale(light.intensity, material.specular * factor);
  }

  return ColorUtils.add(ColorUtils.add(ambient, diffuse), specular);
}
